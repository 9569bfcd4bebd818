import type {
  ExecutionError,
  ExecutionStatus,
  OrchestratorState,
} from "./orchestration";

export type OracleStage = "analysis" | "selection" | "merge";

export type AgentExecutionEvent = {
  runId: string;
  agentName: string;
  status: ExecutionStatus;
  durationMs: number;
  tokensIn: number;
  tokensOut: number;
  toolCalls: readonly string[];
  error?: ExecutionError;
};

export type OracleCallEvent = {
  runId?: string;
  stage: OracleStage;
  durationMs: number;
  promptTokens: number;
  completionTokens: number;
  error?: string;
};

export type StateChangeEvent = {
  runId: string;
  from: OrchestratorState;
  to: OrchestratorState;
};

export type RunCompleteEvent = {
  runId: string;
  degraded: boolean;
  totalDurationMs: number;
  contributingAgents: readonly string[];
};

export type EventMap = {
  "agent:execution:complete": AgentExecutionEvent;
  "oracle:complete": OracleCallEvent;
  "orchestrator:state": StateChangeEvent;
  "orchestrator:run:complete": RunCompleteEvent;
  "runtime:ready": Record<string, never>;
  "runtime:shutdown": Record<string, never>;
};

export type EventName = keyof EventMap;

export type EventHandler<T = unknown> = (payload: T) => void | Promise<void>;

/**
 * Append-only observability sink. The core emits; it never queries.
 * Implementations own their synchronisation.
 */
export interface EventBus {
  on<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void;
  off<K extends EventName>(event: K, handler: EventHandler<EventMap[K]>): void;
  emit<K extends EventName>(event: K, payload: EventMap[K]): Promise<void>;
}
