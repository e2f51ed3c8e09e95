import type { Agent } from "../agents/adapter.js";
import { describeError } from "../errors.js";
import { PlannerResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import { TaskGraph } from "./task-graph.js";
import type { TaskInit } from "./types.js";

const PLANNER_PROMPT = `Break this task into 3-5 smaller subtasks. Return ONLY a JSON array:
[{"id": "1", "description": "...", "dependencies": [], "priority": 1}]

Rules:
- "dependencies" lists ids of subtasks that must complete first
- Independent subtasks have empty dependencies so they run in parallel
- Higher "priority" runs first among subtasks that are ready together
- Output raw JSON only, no markdown fences`;

export type PlannerOptions = {
  /** Agent asked to produce the decomposition. */
  agent: Agent;
  /** Agent name or role the generated tasks are assigned to. */
  assignTo?: string;
};

/** Decomposes a goal into a task graph by asking an agent. */
export class Planner {
  private agent: Agent;
  private assignTo?: string;

  constructor(opts: PlannerOptions) {
    this.agent = opts.agent;
    this.assignTo = opts.assignTo;
  }

  /**
   * Plan `goal`. A response that cannot be parsed falls back to a single
   * task holding the whole goal; a plan with a cycle throws `CycleError`.
   */
  async plan(goal: string): Promise<TaskGraph> {
    const answer = await this.agent.propose({
      taskId: "plan",
      spec: { description: `${PLANNER_PROMPT}\n\nTask: ${goal}` },
      upstream: {},
      attempt: 0,
    });
    return TaskGraph.fromTasks(this.toTasks(goal, answer.payload));
  }

  /** Turn a planner answer into task definitions. */
  toTasks(goal: string, payload: unknown): TaskInit[] {
    const parsed = PlannerResponseSchema.safeParse(typeof payload === "string" ? extractJson(payload) : payload);
    if (!parsed.success) {
      log.warn("Planner response unusable, falling back to a single task", {
        error: parsed.error.issues[0]?.message,
      });
      return [{ id: "1", spec: this.spec(goal) }];
    }

    const ids = new Set(parsed.data.map((s) => s.id));
    return parsed.data.map((subtask) => {
      const unknown = subtask.dependencies.filter((d) => !ids.has(d));
      if (unknown.length > 0) {
        log.warn(`Dropping unknown dependencies of subtask "${subtask.id}"`, { unknown });
      }
      return {
        id: subtask.id,
        spec: this.spec(subtask.description),
        priority: subtask.priority,
        dependsOn: subtask.dependencies.filter((d) => ids.has(d)),
      };
    });
  }

  private spec(description: string): TaskInit["spec"] {
    return this.assignTo ? { description, assignTo: this.assignTo } : { description };
  }
}

/** Pull a JSON array out of model text that may carry fences or prose. */
function extractJson(raw: string): unknown {
  const cleaned = raw.replace(/^```(?:json)?\s*\n?/m, "").replace(/\n?```\s*$/m, "").trim();
  const candidates = [cleaned, raw.match(/\[[\s\S]*\]/)?.[0]];
  for (const candidate of candidates) {
    if (!candidate) continue;
    try {
      return JSON.parse(candidate);
    } catch (err) {
      log.debug("Planner JSON candidate rejected", { error: describeError(err) });
    }
  }
  return undefined;
}
