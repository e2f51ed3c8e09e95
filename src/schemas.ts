import { z } from "zod";
import type { JsonValue } from "./agents/adapter.js";
import { ValidationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Run configuration
// ---------------------------------------------------------------------------

const FaultToleranceSchema = z.number().int().min(0);

export const RetryBackoffSchema = z.object({
  baseMs: z.number().min(0),
  multiplier: z.number().min(1),
  maxMs: z.number().min(0),
});

export const RunConfigSchema = z.object({
  concurrency: z.number().int().min(1),
  defaultFaultTolerance: FaultToleranceSchema.nullable(),
  perTaskConsensusOverride: z.record(z.union([FaultToleranceSchema, z.literal("none")])),
  maxRetries: z.number().int().min(0),
  retryBackoff: RetryBackoffSchema,
  consensusTimeoutMs: z.number().int().positive(),
  agentTimeoutMs: z.number().int().positive(),
  similarityThreshold: z.number().gt(0).max(1),
  fanOut: z.enum(["reuse", "redraw"]),
});

export const RunConfigInputSchema = RunConfigSchema.deepPartial();

// ---------------------------------------------------------------------------
// Graph files
// ---------------------------------------------------------------------------

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const TaskSpecSchema = z.object({
  description: z.string().min(1),
  assignTo: z.string().min(1).optional(),
  input: z.record(z.unknown()).optional(),
});

export const TaskInitSchema = z.object({
  id: z.string().min(1),
  spec: TaskSpecSchema,
  priority: z.number().int().optional(),
  dependsOn: z.array(z.string().min(1)).optional(),
  maxRetries: z.number().int().min(0).optional(),
  consensus: z.union([FaultToleranceSchema, z.literal("none")]).optional(),
});

export const GraphFileSchema = z.object({
  tasks: z.array(TaskInitSchema).min(1),
  config: RunConfigInputSchema.optional(),
});

export type GraphFile = z.infer<typeof GraphFileSchema>;

// ---------------------------------------------------------------------------
// Planner output
// ---------------------------------------------------------------------------

export const PlannedSubtaskSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  description: z.string().min(1),
  dependencies: z.array(z.union([z.string(), z.number()]).transform(String)).default([]),
  priority: z.number().int().default(0),
});

export const PlannerResponseSchema = z.array(PlannedSubtaskSchema).min(1);

// ---------------------------------------------------------------------------
// Model HTTP API responses
// ---------------------------------------------------------------------------

export const GenerateResponseSchema = z.object({
  response: z.string(),
});

export const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

// ---------------------------------------------------------------------------
// Stored run reports
// ---------------------------------------------------------------------------

const AnswerPayloadSchema = z.union([z.string(), z.record(JsonValueSchema), z.array(JsonValueSchema)]);

export const TaskReportSchema = z.object({
  id: z.string(),
  status: z.enum(["succeeded", "failed"]),
  result: z
    .object({
      payload: AnswerPayloadSchema,
      producedBy: z.array(z.string()),
      support: z.number(),
    })
    .optional(),
  failure: z
    .object({
      reason: z.enum(["AgentFailure", "ConsensusFailure", "UpstreamFailure", "Cancelled"]),
      detail: z.string(),
    })
    .optional(),
  retryCount: z.number().int(),
  attempts: z.number().int(),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
  durationMs: z.number().optional(),
});

export const RunReportSchema = z.object({
  runId: z.string(),
  success: z.boolean(),
  cancelled: z.boolean(),
  startedAt: z.number(),
  finishedAt: z.number(),
  durationMs: z.number(),
  counts: z.object({ succeeded: z.number().int(), failed: z.number().int() }),
  tasks: z.array(TaskReportSchema),
});

/** Parse `data` with `schema`, throwing a ValidationError that names `label`. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`);
  }
  return result.data;
}
