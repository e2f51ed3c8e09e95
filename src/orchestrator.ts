import type { Agent } from "./agents/adapter.js";
import { AgentRegistry } from "./agents/registry.js";
import type { RunConfigInput } from "./config.js";
import { resolveRunConfig } from "./config.js";
import { ConsensusEngine } from "./consensus/engine.js";
import { consensusRequirement } from "./consensus/policy.js";
import { describeError, ValidationError } from "./errors.js";
import { TaskExecutor } from "./executor/executor.js";
import { WorkerPool } from "./executor/worker-pool.js";
import type { TaskGraph } from "./planner/task-graph.js";
import type { FailureReason, Task, TaskFailure, TaskResult } from "./planner/types.js";
import type { RunContext, RunEvents } from "./run-context.js";
import { createRunContext, recordAttempt, recordFinish } from "./run-context.js";
import type { ResultSink } from "./sink/result-sink.js";
import { notifySink } from "./sink/result-sink.js";
import { backoffDelay, sleep } from "./utils/retry.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConsensusPolicy = Pick<RunConfigInput, "defaultFaultTolerance" | "perTaskConsensusOverride">;

export type RunOptions = {
  /** Worker-pool size; shorthand for `config.concurrency`. */
  concurrency?: number;
  consensusPolicy?: ConsensusPolicy;
  config?: RunConfigInput;
  /** Aborting stops dispatch; unfinished tasks end `failed` with `Cancelled`. */
  signal?: AbortSignal;
  events?: RunEvents;
  /** Replaces the orchestrator's sink for this run. */
  sink?: ResultSink;
  runId?: string;
};

export type TaskReport = {
  id: string;
  status: "succeeded" | "failed";
  result?: TaskResult;
  failure?: TaskFailure;
  retryCount: number;
  attempts: number;
  startedAt?: number;
  finishedAt?: number;
  durationMs?: number;
};

export type RunReport = {
  runId: string;
  /** Every task succeeded. */
  success: boolean;
  cancelled: boolean;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  counts: { succeeded: number; failed: number };
  tasks: TaskReport[];
};

export type OrchestratorOptions = {
  agents?: AgentRegistry;
  engine?: ConsensusEngine;
  /** Base configuration; run options are merged over it. */
  config?: RunConfigInput;
  sink?: ResultSink;
};

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly agents: AgentRegistry;
  private engine: ConsensusEngine;
  private baseConfig?: RunConfigInput;
  private sink?: ResultSink;
  private claimed = new WeakSet<TaskGraph>();

  constructor(opts?: OrchestratorOptions) {
    this.agents = opts?.agents ?? new AgentRegistry();
    this.engine = opts?.engine ?? new ConsensusEngine();
    this.baseConfig = opts?.config;
    this.sink = opts?.sink;
  }

  addAgent(agent: Agent): void {
    this.agents.add(agent);
  }

  /**
   * Run every task of `graph` to a terminal status.
   *
   * Rejects only for graph or configuration errors found before scheduling.
   * Task failures are recorded on the tasks and in the report.
   */
  async run(graph: TaskGraph, opts?: RunOptions): Promise<RunReport> {
    graph.validate();
    this.claim(graph);

    const config = resolveRunConfig(this.baseConfig, opts?.config, {
      concurrency: opts?.concurrency,
      ...opts?.consensusPolicy,
    });
    const ctx = createRunContext({
      config,
      runId: opts?.runId,
      signal: opts?.signal,
      events: opts?.events,
      sink: opts?.sink ?? this.sink,
    });
    const pool = new WorkerPool(config.concurrency);
    const executor = new TaskExecutor({
      agents: this.agents,
      engine: this.engine,
      fanOut: config.fanOut,
      consensusTimeoutMs: config.consensusTimeoutMs,
      similarityThreshold: config.similarityThreshold,
      log: ctx.log,
    });

    ctx.log.info(`Starting run with ${graph.size} tasks`, {
      concurrency: config.concurrency,
      defaultFaultTolerance: config.defaultFaultTolerance,
      agents: this.agents.names(),
    });

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<void>((resolve) => {
      onAbort = () => resolve();
      if (ctx.signal.aborted) resolve();
      else ctx.signal.addEventListener("abort", onAbort, { once: true });
    });

    const inFlight = new Map<string, Promise<void>>();
    try {
      while (!ctx.signal.aborted) {
        for (const task of graph.readyTasks()) {
          if (!pool.tryAcquire()) break;
          const running = this.runTask(graph, task, executor, ctx).finally(() => {
            pool.release();
            inFlight.delete(task.id);
          });
          inFlight.set(task.id, running);
        }
        if (inFlight.size === 0) break;
        await Promise.race([...inFlight.values(), aborted]);
      }

      if (ctx.signal.aborted) {
        ctx.log.warn(`Run cancelled, waiting for ${inFlight.size} in-flight tasks`);
        await Promise.allSettled(inFlight.values());
      }
    } finally {
      if (onAbort) ctx.signal.removeEventListener("abort", onAbort);
    }

    const cancelled = ctx.signal.aborted;
    if (!graph.isComplete()) {
      const detail = cancelled ? "Run cancelled" : "No runnable tasks left";
      if (!cancelled) ctx.log.error("Scheduling stalled with non-terminal tasks");
      for (const id of graph.cancelRemaining(detail)) recordFinish(ctx, id);
    }

    const report = this.buildReport(graph, ctx, cancelled);
    ctx.log.info("Run finished", { ...report.counts, cancelled, durationMs: report.durationMs });
    return report;
  }

  private claim(graph: TaskGraph): void {
    const started = graph.list().some((t) => t.status !== "pending" && t.status !== "ready");
    if (this.claimed.has(graph) || started) {
      throw new ValidationError("VALIDATION_FAILED", "Task graph has already been run");
    }
    this.claimed.add(graph);
  }

  /** One task from first attempt to terminal status. Never rejects. */
  private async runTask(graph: TaskGraph, task: Task, executor: TaskExecutor, ctx: RunContext): Promise<void> {
    const requirement = consensusRequirement(task, ctx.config);
    const maxRetries = task.maxRetries ?? ctx.config.maxRetries;
    graph.markRunning(task.id);

    try {
      for (let attempt = 0; ; attempt++) {
        recordAttempt(ctx, task);
        ctx.events.onTaskStart?.(task.id, attempt);
        if (requirement.mode === "consensus") graph.markAwaitingConsensus(task.id);

        const outcome = await executor.attempt(
          { taskId: task.id, spec: task.spec, upstream: this.upstreamOf(graph, task), attempt },
          requirement,
        );
        if (outcome.consensus) ctx.events.onConsensus?.(task.id, outcome.consensus);

        if (outcome.ok) {
          this.succeed(graph, task, outcome.result, ctx);
          return;
        }
        if (attempt >= maxRetries) {
          this.fail(graph, task, outcome.reason, outcome.detail, ctx);
          return;
        }
        if (ctx.signal.aborted) {
          this.fail(graph, task, "Cancelled", `Cancelled after attempt ${attempt + 1}: ${outcome.detail}`, ctx);
          return;
        }

        graph.recordRetry(task.id);
        const delay = backoffDelay(attempt + 1, ctx.config.retryBackoff);
        ctx.log.warn(`Task "${task.id}" attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
          reason: outcome.reason,
          detail: outcome.detail,
        });
        ctx.events.onRetry?.(task.id, attempt + 1, delay, outcome.detail);

        if (!(await sleep(delay, ctx.signal))) {
          this.fail(graph, task, "Cancelled", `Cancelled while waiting to retry: ${outcome.detail}`, ctx);
          return;
        }
      }
    } catch (err) {
      ctx.log.error(`Task "${task.id}" aborted unexpectedly`, { error: describeError(err) });
      if (task.status !== "succeeded" && task.status !== "failed") {
        this.fail(graph, task, "AgentFailure", describeError(err), ctx);
      }
    }
  }

  private succeed(graph: TaskGraph, task: Task, result: TaskResult, ctx: RunContext): void {
    const unlocked = graph.markSucceeded(task.id, result);
    recordFinish(ctx, task.id);
    ctx.log.info(`Task "${task.id}" succeeded`, {
      support: result.support,
      unlocked: unlocked.map((t) => t.id),
    });
    if (ctx.sink) notifySink(ctx.sink, task.id, result, ctx.log);
    ctx.events.onTaskEnd?.(task.id, { result });
  }

  private fail(graph: TaskGraph, task: Task, reason: FailureReason, detail: string, ctx: RunContext): void {
    const failure: TaskFailure = { reason, detail };
    const downstream = graph.markFailed(task.id, failure);
    recordFinish(ctx, task.id);
    ctx.log.warn(`Task "${task.id}" failed`, { reason, detail, downstream });
    ctx.events.onTaskEnd?.(task.id, { failure });
    for (const id of downstream) {
      ctx.events.onTaskEnd?.(id, { failure: graph.get(id).failure });
    }
  }

  private upstreamOf(graph: TaskGraph, task: Task): Record<string, TaskResult> {
    const upstream: Record<string, TaskResult> = {};
    for (const dep of task.dependsOn) {
      const result = graph.get(dep).result;
      if (result) upstream[dep] = result;
    }
    return upstream;
  }

  private buildReport(graph: TaskGraph, ctx: RunContext, cancelled: boolean): RunReport {
    const finishedAt = Date.now();
    const tasks: TaskReport[] = graph.snapshot().map((t) => {
      const timing = ctx.timings.get(t.id);
      const report: TaskReport = {
        id: t.id,
        status: t.status === "succeeded" ? "succeeded" : "failed",
        retryCount: t.retryCount,
        attempts: timing?.attempts ?? 0,
      };
      if (t.result) report.result = t.result;
      if (t.failure) report.failure = t.failure;
      if (timing) {
        report.startedAt = timing.startedAt;
        report.finishedAt = timing.finishedAt;
        if (timing.finishedAt !== undefined) report.durationMs = timing.finishedAt - timing.startedAt;
      }
      return report;
    });

    const succeeded = tasks.filter((t) => t.status === "succeeded").length;
    return {
      runId: ctx.runId,
      success: succeeded === tasks.length,
      cancelled,
      startedAt: ctx.startedAt,
      finishedAt,
      durationMs: finishedAt - ctx.startedAt,
      counts: { succeeded, failed: tasks.length - succeeded },
      tasks,
    };
  }
}
