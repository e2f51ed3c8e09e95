import type { RunConfig } from "../config.js";
import type { Task } from "../planner/types.js";

export type ConsensusRequirement = { mode: "single" } | { mode: "consensus"; f: number };

/**
 * How a task is executed. Precedence: the run's per-task override, then the
 * task's own setting, then the run default.
 */
export function consensusRequirement(
  task: Pick<Task, "id" | "consensus">,
  config: Pick<RunConfig, "perTaskConsensusOverride" | "defaultFaultTolerance">,
): ConsensusRequirement {
  const setting =
    config.perTaskConsensusOverride[task.id] ?? task.consensus ?? config.defaultFaultTolerance;
  if (setting === null || setting === "none") return { mode: "single" };
  return { mode: "consensus", f: setting };
}

/** Number of independent answers fanned out for a requirement. */
export function fanOutSize(requirement: ConsensusRequirement): number {
  return requirement.mode === "single" ? 1 : 2 * requirement.f + 1;
}
