import type { AgentAnswer } from "../agents/adapter.js";
import { defaults } from "../config.js";
import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";
import { ConsensusRound, DEFAULT_SIMILARITY_THRESHOLD } from "./round.js";
import type { ConsensusOptions, ConsensusOutcome } from "./types.js";

export type ConsensusEngineOptions = {
  similarityThreshold?: number;
  timeoutMs?: number;
};

/**
 * Majority-with-similarity voting over independent agent answers.
 *
 * Tolerates up to `f` faulty answers out of `2f+1`: the accepted bucket
 * needs `f+1` supporters and strictly more than any other bucket.
 */
export class ConsensusEngine {
  private similarityThreshold: number;
  private timeoutMs: number;

  constructor(opts?: ConsensusEngineOptions) {
    this.similarityThreshold = opts?.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.timeoutMs = opts?.timeoutMs ?? defaults.consensusTimeoutMs;
  }

  /**
   * Reduce answers to one outcome. Entries may still be in flight; a rejected
   * entry counts as a failed call. Resolves as soon as the outcome is decided,
   * without waiting for stragglers.
   */
  resolve(
    answers: Iterable<AgentAnswer | Promise<AgentAnswer>>,
    f: number,
    opts?: ConsensusOptions,
  ): Promise<ConsensusOutcome> {
    const entries = [...answers];
    const round = new ConsensusRound({
      f,
      round: opts?.round,
      expected: entries.length,
      similarityThreshold: opts?.similarityThreshold ?? this.similarityThreshold,
    });
    const timeoutMs = opts?.timeoutMs ?? this.timeoutMs;

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = () => {
        clearTimeout(timer);
        const outcome = round.result();
        log.debug(`Consensus round ${outcome.round} ${outcome.status}`, {
          f,
          received: outcome.received,
          failed: outcome.failed,
          tally: outcome.tally,
        });
        resolve(outcome);
      };

      const settle = () => {
        if (round.outcome !== "pending") return;
        if (round.evaluate() !== "pending") finish();
      };

      if (entries.length === 0) {
        round.evaluate();
        finish();
        return;
      }

      timer = setTimeout(() => {
        if (round.outcome !== "pending") return;
        round.expire();
        finish();
      }, timeoutMs);

      for (const entry of entries) {
        void Promise.resolve(entry).then(
          (answer) => {
            round.add(answer);
            settle();
          },
          (err: unknown) => {
            log.debug("Consensus answer failed", { error: describeError(err) });
            round.addFailure();
            settle();
          },
        );
      }
    });
  }
}
