import {
  ConfigError,
  CycleError,
  DuplicateIdError,
  UnknownDependencyError,
  ValidationError,
} from "../errors.js";
import type { Task, TaskFailure, TaskInit, TaskResult, TaskStatus } from "./types.js";
import { isTerminal } from "./types.js";

/** Ordering used for dispatch: higher priority first, then ascending id. */
export function compareForDispatch(a: Task, b: Task): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

const isCount = (n: number) => Number.isInteger(n) && n >= 0;

/** Per-task retry and consensus limits must be non-negative integers. */
function checkTaskLimits(task: Pick<TaskInit, "id" | "maxRetries" | "consensus">): void {
  if (task.maxRetries !== undefined && !isCount(task.maxRetries)) {
    throw new ConfigError(`Task "${task.id}": maxRetries must be a non-negative integer, got ${task.maxRetries}`);
  }
  if (typeof task.consensus === "number" && !isCount(task.consensus)) {
    throw new ConfigError(`Task "${task.id}": fault tolerance must be a non-negative integer, got ${task.consensus}`);
  }
}

/**
 * Dependency graph of tasks. Holds status but never executes anything.
 *
 * Dependencies may name tasks that have not been added yet; `validate()`
 * rejects any that are still missing when the graph is handed to a run.
 */
export class TaskGraph {
  private tasks = new Map<string, Task>();
  /** dependency id → ids of tasks that directly depend on it */
  private dependents = new Map<string, Set<string>>();

  /** Build a graph from a list, in any order. Missing dependencies are an error. */
  static fromTasks(inits: TaskInit[]): TaskGraph {
    const graph = new TaskGraph();
    for (const init of inits) {
      graph.addTask(init);
    }
    graph.validate();
    return graph;
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Add a task. Throws `DuplicateIdError` for a known id and `CycleError`
   * if one of the new edges closes a loop, `ConfigError` for invalid retry
   * or consensus limits; the graph is unchanged on error.
   */
  addTask(init: TaskInit, dependencies: string[] = init.dependsOn ?? []): Task {
    if (this.tasks.has(init.id)) {
      throw new DuplicateIdError(init.id);
    }
    checkTaskLimits(init);

    const deps = [...new Set(dependencies)];
    const cycle = this.findCycleThrough(init.id, deps);
    if (cycle) {
      throw new CycleError(cycle);
    }

    const task: Task = {
      id: init.id,
      priority: init.priority ?? 0,
      dependsOn: deps,
      spec: init.spec,
      status: "pending",
      retryCount: 0,
      maxRetries: init.maxRetries,
      consensus: init.consensus,
    };
    this.tasks.set(task.id, task);
    for (const dep of deps) {
      const set = this.dependents.get(dep) ?? new Set<string>();
      set.add(task.id);
      this.dependents.set(dep, set);
    }

    this.promoteIfReady(task);
    return task;
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  get(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new ValidationError("UNKNOWN_TASK", `Unknown task "${id}"`);
    }
    return task;
  }

  list(): Task[] {
    return [...this.tasks.values()];
  }

  /** Throw if any dependency names a task that was never added, or a task's limits are invalid. */
  validate(): void {
    for (const task of this.tasks.values()) {
      checkTaskLimits(task);
      for (const dep of task.dependsOn) {
        if (!this.tasks.has(dep)) {
          throw new UnknownDependencyError(task.id, dep);
        }
      }
    }
  }

  /** Ready tasks in dispatch order. */
  readyTasks(): Task[] {
    return this.list()
      .filter((t) => t.status === "ready")
      .sort(compareForDispatch);
  }

  /** Every task reachable through dependent edges, nearest first. */
  dependentsOf(id: string): string[] {
    const out: string[] = [];
    const seen = new Set<string>();
    const queue = [...(this.dependents.get(id) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      out.push(next);
      queue.push(...(this.dependents.get(next) ?? []));
    }
    return out;
  }

  /** Kahn's algorithm, using the dispatch ordering among tasks available at each step. */
  topologicalOrder(): Task[] {
    const remaining = new Map<string, number>();
    for (const task of this.tasks.values()) {
      remaining.set(task.id, task.dependsOn.filter((d) => this.tasks.has(d)).length);
    }
    const available = this.list().filter((t) => remaining.get(t.id) === 0);
    const order: Task[] = [];

    while (available.length > 0) {
      available.sort(compareForDispatch);
      const task = available.shift();
      if (!task) break;
      order.push(task);
      for (const dep of this.dependents.get(task.id) ?? []) {
        const left = (remaining.get(dep) ?? 0) - 1;
        remaining.set(dep, left);
        const dependent = this.tasks.get(dep);
        if (left === 0 && dependent) available.push(dependent);
      }
    }
    return order;
  }

  isComplete(): boolean {
    return this.list().every((t) => isTerminal(t.status));
  }

  markRunning(id: string): void {
    this.transition(id, ["ready", "awaiting-consensus", "running"], "running");
  }

  markAwaitingConsensus(id: string): void {
    this.transition(id, ["running"], "awaiting-consensus");
  }

  /** Record a finished attempt that will be retried. */
  recordRetry(id: string): void {
    const task = this.get(id);
    this.transition(id, ["running", "awaiting-consensus"], "running");
    task.retryCount += 1;
  }

  /** Mark succeeded and promote dependents whose dependencies are now all met. */
  markSucceeded(id: string, result: TaskResult): Task[] {
    const task = this.get(id);
    this.transition(id, ["running", "awaiting-consensus"], "succeeded");
    task.result = result;

    const promoted: Task[] = [];
    for (const depId of this.dependents.get(id) ?? []) {
      const dependent = this.tasks.get(depId);
      if (dependent && this.promoteIfReady(dependent)) promoted.push(dependent);
    }
    return promoted;
  }

  /**
   * Mark failed and fail every transitive dependent with `UpstreamFailure`.
   * Returns the ids of the dependents that were failed.
   */
  markFailed(id: string, failure: TaskFailure): string[] {
    const task = this.get(id);
    if (isTerminal(task.status)) {
      throw new ValidationError("VALIDATION_FAILED", `Task "${id}" is already ${task.status}`);
    }
    task.status = "failed";
    task.failure = failure;

    const upstream: string[] = [];
    for (const depId of this.dependentsOf(id)) {
      const dependent = this.tasks.get(depId);
      if (!dependent || isTerminal(dependent.status)) continue;
      dependent.status = "failed";
      dependent.failure = { reason: "UpstreamFailure", detail: `Dependency "${id}" failed` };
      upstream.push(depId);
    }
    return upstream;
  }

  /** Fail every non-terminal task with `Cancelled`, without propagation. */
  cancelRemaining(detail = "Run cancelled"): string[] {
    const cancelled: string[] = [];
    for (const task of this.tasks.values()) {
      if (isTerminal(task.status)) continue;
      task.status = "failed";
      task.failure = { reason: "Cancelled", detail };
      cancelled.push(task.id);
    }
    return cancelled;
  }

  /** Deep copy of every task, for reports. */
  snapshot(): Task[] {
    return this.list().map((t) => structuredClone(t));
  }

  private transition(id: string, from: TaskStatus[], to: TaskStatus): void {
    const task = this.get(id);
    if (!from.includes(task.status)) {
      throw new ValidationError(
        "VALIDATION_FAILED",
        `Task "${id}" cannot move from ${task.status} to ${to}`,
      );
    }
    task.status = to;
  }

  private promoteIfReady(task: Task): boolean {
    if (task.status !== "pending") return false;
    const met = task.dependsOn.every((d) => this.tasks.get(d)?.status === "succeeded");
    if (met) task.status = "ready";
    return met;
  }

  /**
   * Adding `id` with edges to `deps` creates a cycle iff `id` already reaches
   * one of them through dependent edges (or depends on itself).
   */
  private findCycleThrough(id: string, deps: string[]): string[] | undefined {
    if (deps.includes(id)) return [id, id];
    const targets = new Set(deps);
    const parent = new Map<string, string>();
    const queue = [id];
    const seen = new Set([id]);

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of this.dependents.get(current) ?? []) {
        if (seen.has(next)) continue;
        seen.add(next);
        parent.set(next, current);
        if (targets.has(next)) {
          // id → … → next, and the new edge makes id depend on next
          const path = [next];
          let cursor = next;
          while (cursor !== id) {
            const up = parent.get(cursor);
            if (up === undefined) break;
            path.unshift(up);
            cursor = up;
          }
          return [...path, id];
        }
        queue.push(next);
      }
    }
    return undefined;
  }
}
