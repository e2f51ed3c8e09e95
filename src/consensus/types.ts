import type { AgentAnswer } from "../agents/adapter.js";

export type RoundOutcome = "pending" | "accepted" | "no-quorum" | "timed-out";

/** Answers judged equivalent. The first answer to arrive represents the bucket. */
export type Bucket = {
  signature: string;
  representative: AgentAnswer;
  members: AgentAnswer[];
};

type OutcomeBase = {
  round: number;
  f: number;
  /** Answers needed for a full quorum: 2f+1. */
  quorum: number;
  /** Usable answers that arrived. */
  received: number;
  /** Calls that failed or returned an empty answer. */
  failed: number;
  /** Bucket signature → supporting answers. */
  tally: Record<string, number>;
};

export type ConsensusOutcome =
  | (OutcomeBase & {
      status: "accepted";
      answer: AgentAnswer;
      support: number;
      agreeing: AgentAnswer[];
    })
  | (OutcomeBase & { status: "no-quorum" | "timed-out" });

export type ConsensusOptions = {
  /** Answer-collection window in ms. */
  timeoutMs?: number;
  /** Round number recorded on the outcome (1-based). */
  round?: number;
  similarityThreshold?: number;
};
