import type { AnswerPayload } from "../agents/adapter.js";

export type TaskStatus =
  | "pending"
  | "ready"
  | "running"
  | "awaiting-consensus"
  | "succeeded"
  | "failed";

export type FailureReason = "AgentFailure" | "ConsensusFailure" | "UpstreamFailure" | "Cancelled";

export type TaskFailure = {
  reason: FailureReason;
  detail: string;
};

/** `"none"` forces single-agent execution; a number is the fault parameter f. */
export type ConsensusSetting = number | "none";

/** Work description handed to agents. The core never interprets `input`. */
export type TaskSpec = {
  description: string;
  /** Preferred agent name or role. */
  assignTo?: string;
  input?: Record<string, unknown>;
};

export type TaskResult = {
  payload: AnswerPayload;
  /** Agents whose answers formed the accepted result. */
  producedBy: string[];
  /** Number of agreeing answers (1 for single-agent tasks). */
  support: number;
};

export type Task = {
  id: string;
  priority: number;
  dependsOn: string[];
  spec: TaskSpec;
  status: TaskStatus;
  result?: TaskResult;
  failure?: TaskFailure;
  retryCount: number;
  /** Overrides the run's maxRetries for this task. */
  maxRetries?: number;
  consensus?: ConsensusSetting;
};

export type TaskInit = {
  id: string;
  spec: TaskSpec;
  priority?: number;
  dependsOn?: string[];
  maxRetries?: number;
  consensus?: ConsensusSetting;
};

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(["succeeded", "failed"]);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}
