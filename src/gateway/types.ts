export type GenerateRequest = {
  prompt: string;
  system?: string;
  /** Overrides the client's default model. */
  model?: string;
  signal?: AbortSignal;
};

/** Language-model invocation: given a prompt, returns text or rejects. */
export interface ModelClient {
  readonly name: string;
  generate(request: GenerateRequest): Promise<string>;
  embed?(text: string, signal?: AbortSignal): Promise<number[]>;
  healthCheck?(): Promise<boolean>;
}

export type HttpModelClientOptions = {
  /** Base URL of an Ollama-compatible server, e.g. http://localhost:11434 */
  baseUrl: string;
  model: string;
  /** Model used for `embed`; embeddings are disabled when omitted. */
  embeddingModel?: string;
  headers?: Record<string, string>;
  name?: string;
};
