import { describeError } from "../errors.js";
import type { TaskResult } from "../planner/types.js";
import type { Logger } from "../utils/logger.js";

/** Receives finalized task results. Return values are ignored. */
export interface ResultSink {
  accept(taskId: string, result: TaskResult): void | Promise<void>;
}

export function callbackSink(fn: (taskId: string, result: TaskResult) => void | Promise<void>): ResultSink {
  return { accept: fn };
}

/** Fire-and-forget delivery: sink failures are logged, never raised into the run. */
export function notifySink(sink: ResultSink, taskId: string, result: TaskResult, log: Logger): void {
  const report = (err: unknown) => log.warn(`Result sink rejected "${taskId}"`, { error: describeError(err) });
  try {
    const pending = sink.accept(taskId, result);
    if (pending instanceof Promise) void pending.catch(report);
  } catch (err) {
    report(err);
  }
}
