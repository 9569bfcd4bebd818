export type { LogLevel, Logger } from "./logger";
export type { ConfigManager } from "./config";
export type { PluginType, PluginContext, Plugin } from "./plugin";
export type { TokenUsage, CompletionOptions, Oracle } from "./oracle";
export type {
  AgentContext,
  AgentExecution,
  Agent,
  AgentRegistration,
} from "./agent";
export type {
  OrchestrationStrategy,
  Intent,
  Complexity,
  AnalysisResult,
  SelectionSource,
  SelectionPlan,
  ExecutionStatus,
  ExecutionError,
  ExecutionResult,
  OrchestrationResult,
  OrchestratorState,
  OrchestratorOptions,
  RunOptions,
} from "./orchestration";
export type {
  OracleStage,
  AgentExecutionEvent,
  OracleCallEvent,
  StateChangeEvent,
  RunCompleteEvent,
  EventMap,
  EventName,
  EventHandler,
  EventBus,
} from "./events";
