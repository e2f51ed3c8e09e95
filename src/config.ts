import { ConfigError } from "./errors.js";
import { RunConfigSchema } from "./schemas.js";

export type RetryBackoff = {
  baseMs: number;
  multiplier: number;
  maxMs: number;
};

export type FanOutStrategy = "reuse" | "redraw";

export type RunConfig = {
  /** Worker-pool slots: tasks executing at the same time. */
  concurrency: number;
  /** Global fault parameter f. `null` runs tasks single-agent unless overridden. */
  defaultFaultTolerance: number | null;
  perTaskConsensusOverride: Record<string, number | "none">;
  /** Retries after the first attempt. */
  maxRetries: number;
  retryBackoff: RetryBackoff;
  consensusTimeoutMs: number;
  /** Per propose call, enforced by the agents themselves. */
  agentTimeoutMs: number;
  /** Free-text answers at or above this similarity share a bucket. */
  similarityThreshold: number;
  /** Whether retries reuse the agents of the first attempt or rotate to the next ones. */
  fanOut: FanOutStrategy;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export type RunConfigInput = DeepPartial<RunConfig>;

const DEFAULTS: RunConfig = {
  concurrency: 4,
  defaultFaultTolerance: 0,
  perTaskConsensusOverride: {},
  maxRetries: 2,
  retryBackoff: {
    baseMs: 250,
    multiplier: 2,
    maxMs: 10_000,
  },
  consensusTimeoutMs: 60_000,
  agentTimeoutMs: 60_000,
  similarityThreshold: 0.85,
  fanOut: "redraw",
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result;
}

/**
 * Resolve a full run configuration from partial layers, later layers winning.
 * Throws `ConfigError` when the merged result is out of range.
 */
export function resolveRunConfig(...layers: Array<RunConfigInput | undefined>): RunConfig {
  let merged: Record<string, unknown> = DEFAULTS;
  for (const layer of layers) {
    if (layer) merged = deepMerge(merged, layer);
  }

  const parsed = RunConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid run configuration: ${msg}`);
  }
  return parsed.data;
}

/** The default config values (frozen). */
export const defaults: Readonly<RunConfig> = Object.freeze(structuredClone(DEFAULTS));
