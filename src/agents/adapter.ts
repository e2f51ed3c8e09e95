import { AgentTimeoutError, AgentUnavailableError, AgentError, describeError } from "../errors.js";
import type { TaskResult, TaskSpec } from "../planner/types.js";
import type { AgentRole } from "./roles.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Free text, or structured content compared by exact match. */
export type AnswerPayload = string | { [key: string]: JsonValue } | JsonValue[];

export type AgentAnswer = {
  taskId: string;
  agent: string;
  payload: AnswerPayload;
  /** Self-reported confidence in [0, 1], when the agent has one. */
  confidence?: number;
  /** Embedding of a text payload, used for similarity bucketing. */
  embedding?: number[];
  timestamp: number;
};

export type ProposeRequest = {
  taskId: string;
  spec: TaskSpec;
  /** Results of the task's succeeded dependencies. */
  upstream: Record<string, TaskResult>;
  /** 0 for the first attempt. */
  attempt: number;
};

/**
 * The single capability the orchestrator needs from a worker.
 *
 * `propose` rejects with `AgentUnavailableError` or `AgentTimeoutError`;
 * implementations never retry on their own.
 */
export interface Agent {
  readonly name: string;
  readonly type: "role" | "function" | string;
  readonly role?: AgentRole;
  readonly description?: string;
  readonly capabilities?: string[];

  propose(request: ProposeRequest): Promise<AgentAnswer>;
  healthCheck?(): Promise<boolean>;
}

export function isEmptyPayload(payload: AnswerPayload): boolean {
  if (typeof payload === "string") return payload.trim().length === 0;
  if (Array.isArray(payload)) return payload.length === 0;
  return Object.keys(payload).length === 0;
}

/**
 * Run `fn` with an abort signal that fires after `timeoutMs`.
 * Timeouts become `AgentTimeoutError`; any other failure becomes
 * `AgentUnavailableError` unless it already is an agent error.
 */
export async function callWithTimeout<T>(
  agent: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AgentTimeoutError(agent, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } catch (err) {
    if (err instanceof AgentError) throw err;
    if (controller.signal.aborted) throw new AgentTimeoutError(agent, timeoutMs);
    throw new AgentUnavailableError(agent, describeError(err), { cause: err });
  } finally {
    clearTimeout(timer);
  }
}
