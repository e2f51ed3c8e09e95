// Config
export { resolveRunConfig, defaults } from "./config.js";
export type { RunConfig, RunConfigInput, RetryBackoff, FanOutStrategy, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  GraphError,
  CycleError,
  DuplicateIdError,
  UnknownDependencyError,
  AgentError,
  AgentUnavailableError,
  AgentTimeoutError,
  ConfigError,
  ParseError,
  ValidationError,
  describeError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  RunConfigSchema,
  RunConfigInputSchema,
  GraphFileSchema,
  TaskInitSchema,
  PlannerResponseSchema,
  RunReportSchema,
} from "./schemas.js";
export type { GraphFile } from "./schemas.js";

// Task graph
export { TaskGraph, compareForDispatch } from "./planner/task-graph.js";
export { Planner } from "./planner/planner.js";
export type { PlannerOptions } from "./planner/planner.js";
export { isTerminal } from "./planner/types.js";
export type {
  Task,
  TaskInit,
  TaskSpec,
  TaskStatus,
  TaskResult,
  TaskFailure,
  FailureReason,
  ConsensusSetting,
} from "./planner/types.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type {
  OrchestratorOptions,
  RunOptions,
  RunReport,
  TaskReport,
  ConsensusPolicy,
} from "./orchestrator.js";
export { createRunContext } from "./run-context.js";
export type { RunContext, RunEvents } from "./run-context.js";
export { TaskExecutor } from "./executor/executor.js";
export { WorkerPool } from "./executor/worker-pool.js";
export type { AttemptOutcome, AttemptRequest } from "./executor/types.js";

// Consensus
export { ConsensusEngine } from "./consensus/engine.js";
export type { ConsensusEngineOptions } from "./consensus/engine.js";
export { ConsensusRound, DEFAULT_SIMILARITY_THRESHOLD } from "./consensus/round.js";
export { consensusRequirement, fanOutSize } from "./consensus/policy.js";
export type { ConsensusRequirement } from "./consensus/policy.js";
export { answerSignature, answerSimilarity } from "./consensus/signature.js";
export type { ConsensusOutcome, ConsensusOptions, RoundOutcome, Bucket } from "./consensus/types.js";

// Agents
export type { Agent, AgentAnswer, AnswerPayload, JsonValue, ProposeRequest } from "./agents/adapter.js";
export { AgentRegistry } from "./agents/registry.js";
export type { AgentHealth } from "./agents/registry.js";
export { RoleAgent } from "./agents/role-agent.js";
export type { RoleAgentOptions } from "./agents/role-agent.js";
export { FunctionAdapter } from "./agents/function-adapter.js";
export type { AgentFunction, FunctionAdapterOptions } from "./agents/function-adapter.js";
export { AGENT_ROLES, isAgentRole } from "./agents/roles.js";
export type { AgentRole } from "./agents/roles.js";

// Model gateway
export { HttpModelClient } from "./gateway/http-client.js";
export type { ModelClient, GenerateRequest, HttpModelClientOptions } from "./gateway/types.js";

// Results
export { callbackSink } from "./sink/result-sink.js";
export type { ResultSink } from "./sink/result-sink.js";
export { RunStore } from "./persistence/store.js";
export type { StoredTaskResult } from "./persistence/store.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { backoffDelay, sleep } from "./utils/retry.js";
