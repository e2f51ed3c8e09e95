import { createHash } from "node:crypto";
import type { AgentAnswer, AnswerPayload, JsonValue } from "../agents/adapter.js";

/** JSON with object keys sorted, so equal structures serialise identically. */
export function stableStringify(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${stableStringify(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, " ");
}

function digest(content: string): string {
  return createHash("sha256").update(content).digest("hex").slice(0, 16);
}

/**
 * Comparison signature of a payload. Structured payloads are identified by
 * their canonical JSON; text by its normalised form.
 */
export function answerSignature(payload: AnswerPayload): string {
  if (typeof payload === "string") {
    return `text:${digest(normalizeText(payload))}`;
  }
  return `json:${digest(stableStringify(payload))}`;
}

export function tokenize(text: string): Set<string> {
  return new Set(normalizeText(text).split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Similarity of two answers in [0, 1].
 *
 * Structured payloads only match exactly. Text uses cosine similarity of the
 * embeddings when both answers carry one of the same length, word-set Jaccard
 * otherwise. Text never matches structured content.
 */
export function answerSimilarity(a: AgentAnswer, b: AgentAnswer): number {
  const aText = typeof a.payload === "string";
  const bText = typeof b.payload === "string";
  if (aText !== bText) return 0;
  if (answerSignature(a.payload) === answerSignature(b.payload)) return 1;
  if (typeof a.payload !== "string" || typeof b.payload !== "string") return 0;

  if (a.embedding && b.embedding && a.embedding.length === b.embedding.length && a.embedding.length > 0) {
    return cosine(a.embedding, b.embedding);
  }
  return jaccard(tokenize(a.payload), tokenize(b.payload));
}
