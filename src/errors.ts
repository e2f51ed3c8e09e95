export type ErrorCode =
  | "CYCLE"
  | "DUPLICATE_ID"
  | "UNKNOWN_DEPENDENCY"
  | "UNKNOWN_TASK"
  | "AGENT_UNAVAILABLE"
  | "AGENT_TIMEOUT"
  | "NO_AGENTS"
  | "DUPLICATE_REGISTRATION"
  | "INVALID_CONFIG"
  | "PARSE_FAILED"
  | "VALIDATION_FAILED";

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Graph construction (fatal: the run never starts)
// ---------------------------------------------------------------------------

export class GraphError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "GraphError";
  }
}

export class CycleError extends GraphError {
  /** Task ids along the offending cycle, first id repeated at the end. */
  readonly path: string[];

  constructor(path: string[]) {
    super("CYCLE", `Task graph contains a cycle: ${path.join(" -> ")}`);
    this.name = "CycleError";
    this.path = path;
  }
}

export class DuplicateIdError extends GraphError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("DUPLICATE_ID", `Task "${taskId}" is already in the graph`);
    this.name = "DuplicateIdError";
    this.taskId = taskId;
  }
}

export class UnknownDependencyError extends GraphError {
  constructor(taskId: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependency}"`);
    this.name = "UnknownDependencyError";
  }
}

// ---------------------------------------------------------------------------
// Agent calls (recovered by retry)
// ---------------------------------------------------------------------------

export class AgentError extends OrchestratorError {
  readonly agent: string;

  constructor(code: ErrorCode, agent: string, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "AgentError";
    this.agent = agent;
  }
}

export class AgentUnavailableError extends AgentError {
  constructor(agent: string, message: string, options?: ErrorOptions) {
    super("AGENT_UNAVAILABLE", agent, `Agent "${agent}" unavailable: ${message}`, options);
    this.name = "AgentUnavailableError";
  }
}

export class AgentTimeoutError extends AgentError {
  readonly timeoutMs: number;

  constructor(agent: string, timeoutMs: number) {
    super("AGENT_TIMEOUT", agent, `Agent "${agent}" timed out after ${timeoutMs}ms`);
    this.name = "AgentTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ---------------------------------------------------------------------------
// Input handling
// ---------------------------------------------------------------------------

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
    this.name = "ConfigError";
  }
}

export class ParseError extends OrchestratorError {
  constructor(message: string, options?: ErrorOptions) {
    super("PARSE_FAILED", message, options);
    this.name = "ParseError";
  }
}

export class ValidationError extends OrchestratorError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
