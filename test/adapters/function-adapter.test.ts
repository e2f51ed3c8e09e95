import { describe, expect, it } from "vitest";
import type { ProposeRequest } from "../../src/agents/adapter.js";
import { callWithTimeout } from "../../src/agents/adapter.js";
import { FunctionAdapter } from "../../src/agents/function-adapter.js";
import { AgentTimeoutError, AgentUnavailableError } from "../../src/errors.js";

const makeRequest = (description: string, attempt = 0): ProposeRequest => ({
  taskId: "test-task",
  spec: { description },
  upstream: {},
  attempt,
});

describe("FunctionAdapter", () => {
  it("wraps the function result in an answer", async () => {
    const adapter = new FunctionAdapter({
      name: "echo",
      fn: async (spec) => `echoed: ${spec.description}`,
    });

    const answer = await adapter.propose(makeRequest("hello"));
    expect(adapter.type).toBe("function");
    expect(answer.agent).toBe("echo");
    expect(answer.taskId).toBe("test-task");
    expect(answer.payload).toBe("echoed: hello");
    expect(answer.embedding).toBeUndefined();
  });

  it("rejects with AgentUnavailableError when the function throws", async () => {
    const adapter = new FunctionAdapter({
      name: "failing",
      fn: async () => {
        throw new Error("boom");
      },
    });

    const err = await adapter.propose(makeRequest("hello")).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentUnavailableError);
    expect(err instanceof Error && err.message).toBe('Agent "failing" unavailable: boom');
  });

  it("rejects with AgentTimeoutError and aborts the function on a slow call", async () => {
    let signalled = false;
    const adapter = new FunctionAdapter({
      name: "slow",
      fn: (_spec, ctx) =>
        new Promise((resolve) => {
          const timer = setTimeout(() => resolve("done"), 5_000);
          ctx.signal.addEventListener("abort", () => {
            signalled = true;
            clearTimeout(timer);
          });
        }),
      timeout: 50,
    });

    await expect(adapter.propose(makeRequest("hello"))).rejects.toBeInstanceOf(AgentTimeoutError);
    expect(signalled).toBe(true);
  });

  it("passes upstream results and the attempt number to the function", async () => {
    let seen: { upstream: unknown; attempt: number } | undefined;
    const adapter = new FunctionAdapter({
      name: "ctx-check",
      fn: async (_spec, ctx) => {
        seen = { upstream: ctx.upstream, attempt: ctx.attempt };
        return "ok";
      },
    });

    const upstream = { a: { payload: "A", producedBy: ["x"], support: 1 } };
    await adapter.propose({ ...makeRequest("b", 2), upstream });
    expect(seen).toEqual({ upstream, attempt: 2 });
  });

  it("returns structured payloads unchanged and attaches embeddings", async () => {
    const adapter = new FunctionAdapter({
      name: "structured",
      fn: async () => ({ verdict: "approve" }),
      embed: () => [0.5, 0.5],
    });

    const answer = await adapter.propose(makeRequest("review"));
    expect(answer.payload).toEqual({ verdict: "approve" });
    expect(answer.embedding).toEqual([0.5, 0.5]);
  });
});

describe("callWithTimeout", () => {
  it("resolves with the value of a fast call", async () => {
    await expect(callWithTimeout("fast", 1_000, async () => 42)).resolves.toBe(42);
  });

  it("passes agent errors through unchanged", async () => {
    const original = new AgentUnavailableError("inner", "offline");
    const err = await callWithTimeout("outer", 1_000, async () => {
      throw original;
    }).catch((e: unknown) => e);
    expect(err).toBe(original);
  });

  it("names the agent and timeout on expiry", async () => {
    const err = await callWithTimeout("sleepy", 20, () => new Promise<never>(() => {})).catch((e: unknown) => e);
    expect(err instanceof AgentTimeoutError && err.message).toBe('Agent "sleepy" timed out after 20ms');
  });
});
