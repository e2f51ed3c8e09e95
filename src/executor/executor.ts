import type { Agent } from "../agents/adapter.js";
import { isEmptyPayload } from "../agents/adapter.js";
import type { AgentRegistry } from "../agents/registry.js";
import type { FanOutStrategy } from "../config.js";
import type { ConsensusEngine } from "../consensus/engine.js";
import type { ConsensusRequirement } from "../consensus/policy.js";
import { fanOutSize } from "../consensus/policy.js";
import { describeError } from "../errors.js";
import type { Logger } from "../utils/logger.js";
import { log as rootLog } from "../utils/logger.js";
import type { AttemptOutcome, AttemptRequest } from "./types.js";

export type TaskExecutorOptions = {
  agents: AgentRegistry;
  engine: ConsensusEngine;
  fanOut: FanOutStrategy;
  consensusTimeoutMs: number;
  similarityThreshold: number;
  log?: Logger;
};

/** Runs single attempts of tasks against the agent pool. */
export class TaskExecutor {
  private agents: AgentRegistry;
  private engine: ConsensusEngine;
  private fanOut: FanOutStrategy;
  private consensusTimeoutMs: number;
  private similarityThreshold: number;
  private log: Logger;

  constructor(opts: TaskExecutorOptions) {
    this.agents = opts.agents;
    this.engine = opts.engine;
    this.fanOut = opts.fanOut;
    this.consensusTimeoutMs = opts.consensusTimeoutMs;
    this.similarityThreshold = opts.similarityThreshold;
    this.log = opts.log ?? rootLog;
  }

  /** Agents for one attempt. `redraw` rotates the pool on every retry. */
  drawAgents(request: AttemptRequest, requirement: ConsensusRequirement): Agent[] {
    const count = fanOutSize(requirement);
    const offset = this.fanOut === "redraw" ? request.attempt * count : 0;
    return this.agents.draw(count, { assignTo: request.spec.assignTo, offset });
  }

  async attempt(request: AttemptRequest, requirement: ConsensusRequirement): Promise<AttemptOutcome> {
    const drawn = this.drawAgents(request, requirement);
    if (drawn.length === 0) {
      return {
        ok: false,
        reason: "AgentFailure",
        detail: `No agent available for task "${request.taskId}" (requested: ${request.spec.assignTo ?? "any"})`,
      };
    }

    return requirement.mode === "single"
      ? this.attemptSingle(request, drawn[0])
      : this.attemptConsensus(request, drawn, requirement.f);
  }

  private async attemptSingle(request: AttemptRequest, agent: Agent): Promise<AttemptOutcome> {
    this.log.info(`Dispatching "${request.taskId}" to agent "${agent.name}"`, { attempt: request.attempt });
    try {
      const answer = await agent.propose({ ...request });
      if (isEmptyPayload(answer.payload)) {
        return { ok: false, reason: "AgentFailure", detail: `Agent "${agent.name}" returned an empty answer` };
      }
      return { ok: true, result: { payload: answer.payload, producedBy: [agent.name], support: 1 } };
    } catch (err) {
      this.log.warn(`Agent "${agent.name}" failed on "${request.taskId}"`, { error: describeError(err) });
      return { ok: false, reason: "AgentFailure", detail: describeError(err) };
    }
  }

  private async attemptConsensus(request: AttemptRequest, drawn: Agent[], f: number): Promise<AttemptOutcome> {
    this.log.info(`Fanning out "${request.taskId}" to ${drawn.length} agents`, {
      f,
      agents: drawn.map((a) => a.name),
      attempt: request.attempt,
    });

    // A synchronous throw from one agent is a missing vote, not a failed attempt
    const outcome = await this.engine.resolve(
      drawn.map((agent) => Promise.resolve().then(() => agent.propose({ ...request }))),
      f,
      {
        round: request.attempt + 1,
        timeoutMs: this.consensusTimeoutMs,
        similarityThreshold: this.similarityThreshold,
      },
    );

    if (outcome.status === "accepted") {
      return {
        ok: true,
        result: {
          payload: outcome.answer.payload,
          producedBy: outcome.agreeing.map((a) => a.agent),
          support: outcome.support,
        },
        consensus: outcome,
      };
    }

    return {
      ok: false,
      reason: "ConsensusFailure",
      detail: `Consensus ${outcome.status}: ${outcome.received} answers (${outcome.failed} failed), tally ${JSON.stringify(outcome.tally)}`,
      consensus: outcome,
    };
  }
}
