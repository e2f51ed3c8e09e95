import { describe, expect, it } from "vitest";
import { RoleAgent } from "../../src/agents/role-agent.js";
import { buildTaskPrompt, isAgentRole, systemPromptFor } from "../../src/agents/roles.js";
import { AgentUnavailableError } from "../../src/errors.js";
import type { GenerateRequest, ModelClient } from "../../src/gateway/types.js";

type FakeClient = ModelClient & { requests: GenerateRequest[]; embedded: string[] };

function fakeClient(reply: string | Error, withEmbeddings = false): FakeClient {
  const client: FakeClient = {
    name: "fake",
    requests: [],
    embedded: [],
    async generate(request) {
      client.requests.push(request);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
  if (withEmbeddings) {
    client.embed = async (text) => {
      client.embedded.push(text);
      return [1, 2, 3];
    };
  }
  return client;
}

describe("buildTaskPrompt", () => {
  it("returns the bare description without upstream results", () => {
    expect(buildTaskPrompt({ description: "Write a haiku" }, {})).toBe("Write a haiku");
  });

  it("lists completed dependencies before the task", () => {
    const prompt = buildTaskPrompt(
      { description: "Summarise", input: { words: 20 } },
      {
        a: { payload: "first", producedBy: ["x"], support: 1 },
        b: { payload: { n: 1 }, producedBy: ["y"], support: 2 },
      },
    );
    expect(prompt).toBe(
      'Completed (a): first\nCompleted (b): {"n":1}\n\nNow do: Summarise\n\nInput:\n{\n  "words": 20\n}',
    );
  });
});

describe("roles", () => {
  it("recognises known roles only", () => {
    expect(isAgentRole("reviewer")).toBe(true);
    expect(isAgentRole("manager")).toBe(false);
  });
});

describe("RoleAgent", () => {
  it("sends the role prompt and returns the trimmed reply", async () => {
    const client = fakeClient("  42 \n");
    const agent = new RoleAgent({ name: "coder-1", role: "coder", client, model: "small" });

    const answer = await agent.propose({
      taskId: "t1",
      spec: { description: "Compute" },
      upstream: {},
      attempt: 0,
    });

    expect(answer.payload).toBe("42");
    expect(answer.agent).toBe("coder-1");
    expect(client.requests).toHaveLength(1);
    expect(client.requests[0].system).toBe(systemPromptFor("coder"));
    expect(client.requests[0].prompt).toBe("Compute");
    expect(client.requests[0].model).toBe("small");
  });

  it("defaults its capabilities to its role", () => {
    const agent = new RoleAgent({ name: "r", role: "reviewer", client: fakeClient("ok") });
    expect(agent.capabilities).toEqual(["reviewer"]);
    expect(agent.type).toBe("role");
  });

  it("attaches an embedding when enabled and the client can embed", async () => {
    const client = fakeClient("answer", true);
    const agent = new RoleAgent({ name: "a", role: "analyst", client, useEmbeddings: true });

    const answer = await agent.propose({ taskId: "t", spec: { description: "d" }, upstream: {}, attempt: 0 });
    expect(answer.embedding).toEqual([1, 2, 3]);
    expect(client.embedded).toEqual(["answer"]);
  });

  it("maps client failures to AgentUnavailableError", async () => {
    const agent = new RoleAgent({ name: "a", role: "analyst", client: fakeClient(new Error("HTTP 500: down")) });
    const err = await agent
      .propose({ taskId: "t", spec: { description: "d" }, upstream: {}, attempt: 0 })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentUnavailableError);
    expect(err instanceof Error && err.message).toBe('Agent "a" unavailable: HTTP 500: down');
  });

  it("reports healthy when the client has no health check", async () => {
    const agent = new RoleAgent({ name: "a", role: "analyst", client: fakeClient("ok") });
    await expect(agent.healthCheck()).resolves.toBe(true);
  });
});
