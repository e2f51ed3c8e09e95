import { ConfigError } from "../errors.js";
import { EmbeddingResponseSchema, GenerateResponseSchema, parseOrThrow } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { GenerateRequest, HttpModelClientOptions, ModelClient } from "./types.js";

/** Client for an Ollama-compatible HTTP API (`/api/generate`, `/api/embeddings`, `/api/tags`). */
export class HttpModelClient implements ModelClient {
  readonly name: string;

  private baseUrl: string;
  private model: string;
  private embeddingModel?: string;
  private headers: Record<string, string>;

  constructor(opts: HttpModelClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, "");
    this.model = opts.model;
    this.embeddingModel = opts.embeddingModel;
    this.headers = opts.headers ?? {};
    this.name = opts.name ?? `http:${this.model}`;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const model = request.model ?? this.model;
    log.debug(`[${this.name}] POST /api/generate`, { model, promptLength: request.prompt.length });

    const body = await this.post(
      "/api/generate",
      { model, prompt: request.prompt, system: request.system, stream: false },
      request.signal,
    );
    return parseOrThrow(GenerateResponseSchema, body, "generate response").response;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (!this.embeddingModel) {
      throw new ConfigError(`Model client "${this.name}" has no embedding model configured`);
    }
    const body = await this.post("/api/embeddings", { model: this.embeddingModel, prompt: text }, signal);
    return parseOrThrow(EmbeddingResponseSchema, body, "embedding response").embedding;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, {
        method: "GET",
        headers: this.headers,
        signal: AbortSignal.timeout(5_000),
      });
      return res.ok;
    } catch (err) {
      log.debug(`[${this.name}] Health check failed`, { error: String(err) });
      return false;
    }
  }

  private async post(path: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify(payload),
      signal,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`HTTP ${res.status}: ${text.slice(0, 200)}`);
    }
    return res.json();
  }
}
