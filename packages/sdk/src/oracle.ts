export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionOptions {
  /** Aborts the in-flight request when the caller's deadline passes. */
  signal?: AbortSignal;
}

/**
 * A stateless text-completion service. Used for query analysis, agent
 * selection and result merging. Implementations apply no retry policy the
 * core knows about; a rejected promise means the call failed.
 */
export interface Oracle {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}
