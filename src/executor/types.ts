import type { ConsensusOutcome } from "../consensus/types.js";
import type { FailureReason, TaskResult, TaskSpec } from "../planner/types.js";

export type AttemptFailureReason = Extract<FailureReason, "AgentFailure" | "ConsensusFailure">;

/** Outcome of one attempt at a task. Attempts never throw. */
export type AttemptOutcome =
  | { ok: true; result: TaskResult; consensus?: ConsensusOutcome }
  | { ok: false; reason: AttemptFailureReason; detail: string; consensus?: ConsensusOutcome };

export type AttemptRequest = {
  taskId: string;
  spec: TaskSpec;
  upstream: Record<string, TaskResult>;
  /** 0-based attempt number. */
  attempt: number;
};
