import type { TokenUsage } from "./oracle";

export type AgentContext = Record<string, unknown>;

export interface AgentExecution {
  output: string;
  /** Identifiers of the tools the agent reports invoking, in call order. */
  toolCalls?: string[];
  usage?: TokenUsage;
}

/**
 * A capability provider. Concrete agents (document retrieval, tool
 * invocation, tabular analysis, code execution, file access) live outside
 * the core and are reached only through this interface.
 */
export interface Agent {
  readonly name: string;
  /** Natural-language capability summary, quoted verbatim in selection prompts. */
  readonly description: string;
  canHandle(
    query: string,
    context: AgentContext,
    signal?: AbortSignal,
  ): boolean | Promise<boolean>;
  execute(
    query: string,
    context: AgentContext,
    signal?: AbortSignal,
  ): Promise<AgentExecution>;
}

export interface AgentRegistration {
  agent: Agent;
  /**
   * Fallback ordering. Higher values are asked first; equal values keep
   * registration order. Defaults to 0.
   */
  priority?: number;
}
