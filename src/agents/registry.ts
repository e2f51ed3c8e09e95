import { ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Agent } from "./adapter.js";

export type AgentHealth = {
  name: string;
  healthy: boolean;
  lastCheck: number;
  responseTimeMs?: number;
  error?: string;
};

export class AgentRegistry {
  private agents = new Map<string, Agent>();
  private healthCache = new Map<string, AgentHealth>();

  add(agent: Agent): void {
    if (this.agents.has(agent.name)) {
      throw new ValidationError("DUPLICATE_REGISTRATION", `Agent "${agent.name}" already registered`);
    }
    this.agents.set(agent.name, agent);
  }

  remove(name: string): boolean {
    this.healthCache.delete(name);
    return this.agents.delete(name);
  }

  get(name: string): Agent | undefined {
    return this.agents.get(name);
  }

  list(): Agent[] {
    return [...this.agents.values()];
  }

  names(): string[] {
    return [...this.agents.keys()];
  }

  get size(): number {
    return this.agents.size;
  }

  /** Agents whose role or capabilities include `cap`. */
  withCapability(cap: string): Agent[] {
    return this.list().filter((a) => a.role === cap || a.capabilities?.includes(cap));
  }

  /** Agents eligible for a task: the named agent, else those with the capability, else everyone. */
  candidates(assignTo?: string): Agent[] {
    if (!assignTo) return this.list();
    const named = this.get(assignTo);
    if (named) return [named];
    return this.withCapability(assignTo);
  }

  /**
   * Draw `count` agents for one attempt, cycling through the candidates so a
   * pool smaller than `count` repeats agents. `offset` shifts the starting
   * point, which lets retries rotate to different agents.
   */
  draw(count: number, opts?: { assignTo?: string; offset?: number }): Agent[] {
    const pool = this.candidates(opts?.assignTo);
    if (pool.length === 0) return [];
    const start = (opts?.offset ?? 0) % pool.length;
    return Array.from({ length: count }, (_, i) => pool[(start + i) % pool.length]);
  }

  /** Check health of a specific agent. */
  async checkHealth(name: string): Promise<AgentHealth> {
    const agent = this.get(name);
    if (!agent) {
      return { name, healthy: false, lastCheck: Date.now(), error: "Agent not found" };
    }

    const start = Date.now();
    let result: AgentHealth;
    try {
      const healthy = agent.healthCheck ? await agent.healthCheck() : true;
      result = { name, healthy, lastCheck: Date.now(), responseTimeMs: Date.now() - start };
    } catch (err) {
      result = {
        name,
        healthy: false,
        lastCheck: Date.now(),
        responseTimeMs: Date.now() - start,
        error: String(err),
      };
      log.warn(`Health check failed for agent "${name}"`, { error: String(err) });
    }
    this.healthCache.set(name, result);
    return result;
  }

  async checkAllHealth(): Promise<AgentHealth[]> {
    return Promise.all(this.names().map((name) => this.checkHealth(name)));
  }

  /** Cached health status, without making new checks. */
  getCachedHealth(name: string): AgentHealth | undefined {
    return this.healthCache.get(name);
  }
}
