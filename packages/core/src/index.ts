export {
  Config,
  DEFAULT_ORCHESTRATOR_OPTIONS,
  MAX_TIMER_MS,
  ensureConfigFile,
  resolveConfigPath,
  resolveLogLevel,
  resolveOrchestratorOptions,
} from "./config";
export { createLogger, setLogLevel, isLogLevel } from "./logger";
export { TypedEventBus } from "./event-bus";
export {
  ErrorCode,
  ConductorError,
  OracleUnavailableError,
  NoAgentAvailableError,
  AllAgentsFailedError,
  DeadlineExceededError,
  CancelledError,
  InvalidTransitionError,
  InvalidRegistrationError,
  ConfigError,
  isConductorError,
} from "./errors";
export type { AgentFailure, ConductorErrorOptions } from "./errors";
export { AgentRegistry } from "./agent/registry";
export { Semaphore } from "./agent/semaphore";
export { ExecutionCoordinator } from "./agent/coordinator";
export type { CoordinatorOptions, ExecuteOptions } from "./agent/coordinator";
export { OracleClient, estimateTokens } from "./orchestration/oracle-client";
export type { OracleCallOptions } from "./orchestration/oracle-client";
export { QueryAnalyzer, assessComplexity, parseAnalysisResponse } from "./orchestration/query-analyzer";
export {
  OracleSelectionStrategy,
  RuleSelectionStrategy,
  matchAgentName,
  parseAgentList,
} from "./orchestration/strategies";
export type { SelectionRequest, SelectionStrategy } from "./orchestration/strategies";
export { AgentSelector } from "./orchestration/selector";
export type { SelectOptions } from "./orchestration/selector";
export { ResultMerger, concatenateResults } from "./orchestration/merger";
export type { MergeOutcome } from "./orchestration/merger";
export { canTransition, transition, isTerminal, validTransitions } from "./orchestration/state-machine";
export { Orchestrator } from "./orchestration/orchestrator";
export type { OrchestratorDependencies } from "./orchestration/orchestrator";
export { Runtime, isPlugin } from "./runtime";
export type { RuntimeSetup } from "./runtime";
