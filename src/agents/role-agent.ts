import { defaults } from "../config.js";
import type { ModelClient } from "../gateway/types.js";
import { log } from "../utils/logger.js";
import type { Agent, AgentAnswer, ProposeRequest } from "./adapter.js";
import { callWithTimeout } from "./adapter.js";
import { buildTaskPrompt, systemPromptFor, type AgentRole } from "./roles.js";

export type RoleAgentOptions = {
  name: string;
  role: AgentRole;
  client: ModelClient;
  /** Overrides the client's default model for this agent. */
  model?: string;
  description?: string;
  capabilities?: string[];
  /** Attach an embedding of each answer, when the client can embed. */
  useEmbeddings?: boolean;
  /** Timeout per propose call in ms (default: the run config default). */
  timeout?: number;
};

/** A language-model agent whose only distinguishing trait is its role prompt. */
export class RoleAgent implements Agent {
  readonly name: string;
  readonly type = "role" as const;
  readonly role: AgentRole;
  readonly description?: string;
  readonly capabilities: string[];

  private client: ModelClient;
  private model?: string;
  private useEmbeddings: boolean;
  private timeout: number;

  constructor(opts: RoleAgentOptions) {
    this.name = opts.name;
    this.role = opts.role;
    this.client = opts.client;
    this.model = opts.model;
    this.description = opts.description;
    this.capabilities = opts.capabilities ?? [opts.role];
    this.useEmbeddings = opts.useEmbeddings ?? false;
    this.timeout = opts.timeout ?? defaults.agentTimeoutMs;
  }

  async propose(request: ProposeRequest): Promise<AgentAnswer> {
    log.info(`[${this.name}] Proposing for task "${request.taskId}"`, { role: this.role, attempt: request.attempt });

    return callWithTimeout(this.name, this.timeout, async (signal) => {
      const text = await this.client.generate({
        prompt: buildTaskPrompt(request.spec, request.upstream),
        system: systemPromptFor(this.role),
        model: this.model,
        signal,
      });

      const answer: AgentAnswer = {
        taskId: request.taskId,
        agent: this.name,
        payload: text.trim(),
        timestamp: Date.now(),
      };
      if (this.useEmbeddings && this.client.embed && answer.payload) {
        answer.embedding = await this.client.embed(text, signal);
      }
      return answer;
    });
  }

  async healthCheck(): Promise<boolean> {
    return this.client.healthCheck ? this.client.healthCheck() : true;
  }
}
