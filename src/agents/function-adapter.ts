import { defaults } from "../config.js";
import type { TaskResult, TaskSpec } from "../planner/types.js";
import { log } from "../utils/logger.js";
import type { Agent, AgentAnswer, AnswerPayload, ProposeRequest } from "./adapter.js";
import { callWithTimeout } from "./adapter.js";
import type { AgentRole } from "./roles.js";

export type AgentFunctionContext = {
  taskId: string;
  upstream: Record<string, TaskResult>;
  attempt: number;
  signal: AbortSignal;
};

export type AgentFunction = (spec: TaskSpec, context: AgentFunctionContext) => Promise<AnswerPayload>;

export type FunctionAdapterOptions = {
  name: string;
  fn: AgentFunction;
  role?: AgentRole;
  description?: string;
  capabilities?: string[];
  /** Derives an embedding for each answer payload. */
  embed?: (payload: AnswerPayload) => number[];
  /** Timeout in ms (default: the run config default) */
  timeout?: number;
};

/** Agent backed by a plain async function. */
export class FunctionAdapter implements Agent {
  readonly name: string;
  readonly type = "function" as const;
  readonly role?: AgentRole;
  readonly description?: string;
  readonly capabilities?: string[];

  private fn: AgentFunction;
  private embed?: (payload: AnswerPayload) => number[];
  private timeout: number;

  constructor(opts: FunctionAdapterOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
    this.role = opts.role;
    this.description = opts.description;
    this.capabilities = opts.capabilities;
    this.embed = opts.embed;
    this.timeout = opts.timeout ?? defaults.agentTimeoutMs;
  }

  async propose(request: ProposeRequest): Promise<AgentAnswer> {
    log.debug(`[${this.name}] Running function for task "${request.taskId}"`);

    const payload = await callWithTimeout(this.name, this.timeout, (signal) =>
      this.fn(request.spec, {
        taskId: request.taskId,
        upstream: request.upstream,
        attempt: request.attempt,
        signal,
      }),
    );

    return {
      taskId: request.taskId,
      agent: this.name,
      payload,
      embedding: this.embed?.(payload),
      timestamp: Date.now(),
    };
  }
}
