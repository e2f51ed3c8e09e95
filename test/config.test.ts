import { describe, expect, it } from "vitest";
import { defaults, resolveRunConfig } from "../src/config.js";
import { consensusRequirement, fanOutSize } from "../src/consensus/policy.js";
import { ConfigError } from "../src/errors.js";
import { backoffDelay, sleep } from "../src/utils/retry.js";

describe("resolveRunConfig", () => {
  it("returns the defaults when given nothing", () => {
    expect(resolveRunConfig()).toEqual(defaults);
    expect(defaults.concurrency).toBe(4);
    expect(defaults.fanOut).toBe("redraw");
  });

  it("merges nested layers, later layers winning", () => {
    const config = resolveRunConfig(
      { concurrency: 8, retryBackoff: { baseMs: 100 } },
      { concurrency: 2, retryBackoff: { maxMs: 500 } },
    );
    expect(config.concurrency).toBe(2);
    expect(config.retryBackoff).toEqual({ baseMs: 100, multiplier: 2, maxMs: 500 });
  });

  it("ignores undefined values in a layer", () => {
    expect(resolveRunConfig({ maxRetries: undefined }).maxRetries).toBe(defaults.maxRetries);
  });

  it("accepts null fault tolerance", () => {
    expect(resolveRunConfig({ defaultFaultTolerance: null }).defaultFaultTolerance).toBeNull();
  });

  it("names the offending field of an invalid config", () => {
    expect(() => resolveRunConfig({ concurrency: 0 })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ retryBackoff: { multiplier: 0.5 } })).toThrow(
      "Invalid run configuration: retryBackoff.multiplier",
    );
  });

  it("does not let callers mutate the defaults", () => {
    const config = resolveRunConfig();
    config.retryBackoff.baseMs = 1;
    expect(defaults.retryBackoff.baseMs).toBe(250);
  });
});

describe("consensusRequirement", () => {
  const config = resolveRunConfig({ defaultFaultTolerance: 1, perTaskConsensusOverride: { b: "none", c: 2 } });

  it("falls back to the run default", () => {
    expect(consensusRequirement({ id: "a" }, config)).toEqual({ mode: "consensus", f: 1 });
  });

  it("prefers the run override over the task's own setting", () => {
    expect(consensusRequirement({ id: "b", consensus: 3 }, config)).toEqual({ mode: "single" });
    expect(consensusRequirement({ id: "c", consensus: "none" }, config)).toEqual({ mode: "consensus", f: 2 });
  });

  it("uses the task setting when there is no override", () => {
    expect(consensusRequirement({ id: "d", consensus: "none" }, config)).toEqual({ mode: "single" });
  });

  it("runs single-agent when the default is null", () => {
    const single = resolveRunConfig({ defaultFaultTolerance: null });
    expect(consensusRequirement({ id: "a" }, single)).toEqual({ mode: "single" });
  });

  it("fans out 2f+1 answers", () => {
    expect(fanOutSize({ mode: "single" })).toBe(1);
    expect(fanOutSize({ mode: "consensus", f: 0 })).toBe(1);
    expect(fanOutSize({ mode: "consensus", f: 2 })).toBe(5);
  });
});

describe("backoffDelay", () => {
  const policy = { baseMs: 100, multiplier: 2, maxMs: 1_000 };

  it("grows exponentially up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n, policy))).toEqual([100, 200, 400, 800, 1_000]);
  });

  it("is zero before the first retry", () => {
    expect(backoffDelay(0, policy)).toBe(0);
  });
});

describe("sleep", () => {
  it("resolves true after the delay", async () => {
    await expect(sleep(1)).resolves.toBe(true);
  });

  it("resolves false as soon as the signal aborts", async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("resolves false for an already-aborted signal", async () => {
    await expect(sleep(10, AbortSignal.abort())).resolves.toBe(false);
  });
});
