import type { TokenUsage } from "./oracle";

export type OrchestrationStrategy = "parallel" | "sequential";

export type Intent = "search" | "analyze" | "create" | "general";

export type Complexity = "low" | "medium" | "high";

export interface AnalysisResult {
  readonly intent: Intent;
  readonly entities: readonly string[];
  readonly complexity: Complexity;
}

export type SelectionSource = "oracle" | "fallback";

export interface SelectionPlan {
  readonly agents: readonly string[];
  readonly source: SelectionSource;
}

export type ExecutionStatus = "success" | "error" | "timeout";

export interface ExecutionError {
  kind: "error" | "timeout" | "cancelled";
  message: string;
}

export interface ExecutionResult {
  readonly agentName: string;
  readonly status: ExecutionStatus;
  readonly output: string;
  /** Present iff `status` is not `"success"`. */
  readonly error?: ExecutionError;
  readonly durationMs: number;
  readonly toolCalls: readonly string[];
  readonly usage?: TokenUsage;
}

export interface OrchestrationResult {
  output: string;
  contributingAgents: string[];
  totalDurationMs: number;
  degraded: boolean;
  plan: SelectionPlan;
  analysis?: AnalysisResult;
  results: readonly ExecutionResult[];
}

export type OrchestratorState =
  | "idle"
  | "analyzing"
  | "selecting"
  | "executing"
  | "merging"
  | "done"
  | "failed";

export interface OrchestratorOptions {
  /** Overall budget for one run, in milliseconds. */
  deadlineMs: number;
  /** Upper bound for a single agent execution. */
  agentTimeoutMs: number;
  /** Ceiling on simultaneously running agents. */
  maxConcurrency: number;
  /** Cap on agents chosen by the predicate fallback. */
  maxFallbackAgents: number;
  strategy: OrchestrationStrategy;
  /** When false, selection runs on the raw query only. */
  analyzeQueries: boolean;
}

export interface RunOptions {
  /** Cancels the whole run, including in-flight agent and oracle calls. */
  signal?: AbortSignal;
  /** Overrides the configured deadline for this run. */
  deadlineMs?: number;
}
