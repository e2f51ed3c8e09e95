import { randomUUID } from "node:crypto";
import type { RunConfig } from "./config.js";
import type { ConsensusOutcome } from "./consensus/types.js";
import type { Task, TaskFailure, TaskResult } from "./planner/types.js";
import type { ResultSink } from "./sink/result-sink.js";
import type { Logger } from "./utils/logger.js";
import { log } from "./utils/logger.js";

export type RunEvents = {
  onTaskStart?: (taskId: string, attempt: number) => void;
  onTaskEnd?: (taskId: string, outcome: { result?: TaskResult; failure?: TaskFailure }) => void;
  onRetry?: (taskId: string, retry: number, delayMs: number, detail: string) => void;
  onConsensus?: (taskId: string, outcome: ConsensusOutcome) => void;
};

export type TaskTiming = {
  startedAt: number;
  finishedAt?: number;
  attempts: number;
};

/**
 * Everything one run needs, owned by the caller of `run`. Nothing about a
 * run lives in module state, so independent runs can share a process.
 */
export type RunContext = {
  readonly runId: string;
  readonly config: Readonly<RunConfig>;
  readonly signal: AbortSignal;
  readonly log: Logger;
  readonly startedAt: number;
  readonly events: RunEvents;
  readonly sink?: ResultSink;
  readonly timings: Map<string, TaskTiming>;
};

export type RunContextInit = {
  config: RunConfig;
  runId?: string;
  signal?: AbortSignal;
  events?: RunEvents;
  sink?: ResultSink;
};

export function createRunContext(init: RunContextInit): RunContext {
  const runId = init.runId ?? randomUUID();
  return {
    runId,
    config: Object.freeze(structuredClone(init.config)),
    signal: init.signal ?? new AbortController().signal,
    log: log.scope(`run:${runId.slice(0, 8)}`),
    startedAt: Date.now(),
    events: init.events ?? {},
    sink: init.sink,
    timings: new Map(),
  };
}

/** Record a task's start, or another attempt of a started task. */
export function recordAttempt(ctx: RunContext, task: Pick<Task, "id">): TaskTiming {
  const timing = ctx.timings.get(task.id) ?? { startedAt: Date.now(), attempts: 0 };
  timing.attempts++;
  ctx.timings.set(task.id, timing);
  return timing;
}

export function recordFinish(ctx: RunContext, taskId: string): void {
  const timing = ctx.timings.get(taskId);
  if (timing) timing.finishedAt = Date.now();
}
