import type { TaskResult, TaskSpec } from "../planner/types.js";

export const AGENT_ROLES = ["analyst", "coder", "reviewer", "planner", "executor"] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

export function isAgentRole(value: string): value is AgentRole {
  return AGENT_ROLES.some((role) => role === value);
}

const SYSTEM_PROMPTS: Record<AgentRole, string> = {
  analyst:
    "You are an analyst. Break down problems, identify requirements, and provide clear analysis. Be thorough but concise.",
  coder:
    "You are an expert programmer. Write clean, efficient code with proper error handling.",
  reviewer:
    "You are a code reviewer. Check for bugs, security issues, performance problems, and style. Be constructive.",
  planner:
    "You are a project planner. Create actionable plans with clear steps and dependencies.",
  executor:
    "You carry out the task exactly as described and answer with the result only.",
};

export function systemPromptFor(role: AgentRole): string {
  return SYSTEM_PROMPTS[role];
}

function renderOutput(result: TaskResult): string {
  return typeof result.payload === "string" ? result.payload : JSON.stringify(result.payload);
}

/** User prompt for a task: completed dependency results first, then the task itself. */
export function buildTaskPrompt(spec: TaskSpec, upstream: Record<string, TaskResult>): string {
  const context = Object.entries(upstream)
    .map(([id, result]) => `Completed (${id}): ${renderOutput(result)}`)
    .join("\n");

  let prompt = context ? `${context}\n\nNow do: ${spec.description}` : spec.description;
  if (spec.input && Object.keys(spec.input).length > 0) {
    prompt += `\n\nInput:\n${JSON.stringify(spec.input, null, 2)}`;
  }
  return prompt;
}
