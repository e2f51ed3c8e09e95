import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError, ValidationError } from "../../src/errors.js";
import { HttpModelClient } from "../../src/gateway/http-client.js";

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("HttpModelClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts a non-streaming generate request and returns the response text", async () => {
    const fetchMock = stubFetch(jsonResponse({ response: "hello", done: true }));
    const client = new HttpModelClient({ baseUrl: "http://models.test/", model: "tiny" });

    await expect(client.generate({ prompt: "hi", system: "be brief" })).resolves.toBe("hello");

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://models.test/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "tiny",
      prompt: "hi",
      system: "be brief",
      stream: false,
    });
  });

  it("uses the per-request model when given", async () => {
    const fetchMock = stubFetch(jsonResponse({ response: "x" }));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });

    await client.generate({ prompt: "p", model: "large" });
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body)).model).toBe("large");
  });

  it("throws with the status and body on an error response", async () => {
    stubFetch(new Response("model not found", { status: 404 }));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });
    await expect(client.generate({ prompt: "p" })).rejects.toThrow("HTTP 404: model not found");
  });

  it("rejects a response without text", async () => {
    stubFetch(jsonResponse({ output: "wrong field" }));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });
    await expect(client.generate({ prompt: "p" })).rejects.toBeInstanceOf(ValidationError);
  });

  it("embeds with the embedding model", async () => {
    const fetchMock = stubFetch(jsonResponse({ embedding: [0.1, 0.2] }));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny", embeddingModel: "embed" });

    await expect(client.embed("text")).resolves.toEqual([0.1, 0.2]);
    expect(fetchMock.mock.calls[0][0]).toBe("http://models.test/api/embeddings");
    expect(JSON.parse(String(fetchMock.mock.calls[0][1]?.body))).toEqual({ model: "embed", prompt: "text" });
  });

  it("refuses to embed without an embedding model", async () => {
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });
    await expect(client.embed("text")).rejects.toBeInstanceOf(ConfigError);
  });

  it("health check returns false when the server is unreachable", async () => {
    stubFetch(new TypeError("fetch failed"));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });
    await expect(client.healthCheck()).resolves.toBe(false);
    expect(client.name).toBe("http:tiny");
  });

  it("health check returns true on a listing response", async () => {
    const fetchMock = stubFetch(jsonResponse({ models: [] }));
    const client = new HttpModelClient({ baseUrl: "http://models.test", model: "tiny" });
    await expect(client.healthCheck()).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][0]).toBe("http://models.test/api/tags");
  });
});
