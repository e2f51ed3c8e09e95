import type { AgentAnswer } from "../agents/adapter.js";
import { isEmptyPayload } from "../agents/adapter.js";
import { ConfigError } from "../errors.js";
import { answerSignature, answerSimilarity } from "./signature.js";
import type { Bucket, ConsensusOutcome, RoundOutcome } from "./types.js";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

export function assertFaultTolerance(f: number): void {
  if (!Number.isInteger(f) || f < 0) {
    throw new ConfigError(`Fault tolerance must be a non-negative integer, got ${f}`);
  }
}

/**
 * One bounded attempt at reducing a task's answers to a single result.
 *
 * A bucket wins once it holds at least f+1 answers and more than every other
 * bucket could still reach given the answers not yet in.
 */
export class ConsensusRound {
  readonly round: number;
  readonly f: number;
  /** Calls fanned out for this round; usually 2f+1. */
  readonly expected: number;
  readonly similarityThreshold: number;

  private buckets: Bucket[] = [];
  private received = 0;
  private failed = 0;
  private state: RoundOutcome = "pending";
  private winner?: Bucket;

  constructor(opts: { f: number; round?: number; expected?: number; similarityThreshold?: number }) {
    assertFaultTolerance(opts.f);
    this.f = opts.f;
    this.round = opts.round ?? 1;
    this.expected = opts.expected ?? 2 * opts.f + 1;
    this.similarityThreshold = opts.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  }

  get quorum(): number {
    return 2 * this.f + 1;
  }

  get outcome(): RoundOutcome {
    return this.state;
  }

  /** Answers still outstanding out of `expected`. */
  get outstanding(): number {
    return Math.max(this.expected - this.received - this.failed, 0);
  }

  /** Record an answer. Empty answers count as failed calls. */
  add(answer: AgentAnswer): void {
    if (this.state !== "pending") return;
    if (isEmptyPayload(answer.payload)) {
      this.failed++;
      return;
    }
    this.received++;
    this.bucketFor(answer).members.push(answer);
  }

  /** Record a call that produced no answer. */
  addFailure(): void {
    if (this.state !== "pending") return;
    this.failed++;
  }

  tally(): Record<string, number> {
    const out: Record<string, number> = {};
    for (const bucket of this.buckets) out[bucket.signature] = bucket.members.length;
    return out;
  }

  /**
   * Decide the round if the answers in hand allow it. When every call has
   * settled the round always ends, either accepted or `no-quorum`.
   */
  evaluate(): RoundOutcome {
    if (this.state !== "pending") return this.state;

    const ranked = [...this.buckets].sort((a, b) => b.members.length - a.members.length);
    const leader = ranked[0];
    const runnerUp = ranked[1]?.members.length ?? 0;

    if (
      leader &&
      leader.members.length >= this.f + 1 &&
      leader.members.length > runnerUp + this.outstanding
    ) {
      this.winner = leader;
      this.state = "accepted";
    } else if (this.outstanding === 0) {
      this.state = "no-quorum";
    }
    return this.state;
  }

  /**
   * Close the round because the collection window elapsed. With a full
   * quorum in hand the answers are judged as they stand; otherwise `timed-out`.
   */
  expire(): RoundOutcome {
    if (this.state !== "pending") return this.state;
    if (this.received >= this.quorum) {
      this.failed += this.outstanding;
      return this.evaluate();
    }
    this.state = "timed-out";
    return this.state;
  }

  result(): ConsensusOutcome {
    const base = {
      round: this.round,
      f: this.f,
      quorum: this.quorum,
      received: this.received,
      failed: this.failed,
      tally: this.tally(),
    };
    if (this.state === "accepted" && this.winner) {
      return {
        ...base,
        status: "accepted",
        answer: this.winner.representative,
        support: this.winner.members.length,
        agreeing: [...this.winner.members],
      };
    }
    if (this.state === "timed-out") return { ...base, status: "timed-out" };
    return { ...base, status: "no-quorum" };
  }

  private bucketFor(answer: AgentAnswer): Bucket {
    const signature = answerSignature(answer.payload);
    const structured = typeof answer.payload !== "string";

    const match = this.buckets.find((b) =>
      structured
        ? b.signature === signature
        : answerSimilarity(b.representative, answer) >= this.similarityThreshold,
    );
    if (match) return match;

    const bucket: Bucket = { signature, representative: answer, members: [] };
    this.buckets.push(bucket);
    return bucket;
  }
}
