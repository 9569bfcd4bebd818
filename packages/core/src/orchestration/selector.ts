import type { AgentContext, AnalysisResult, Logger, SelectionPlan, SelectionSource } from "@conductor/sdk";
import type { AgentRegistry } from "../agent/registry";
import { NoAgentAvailableError } from "../errors";
import { errorMessage } from "../logger";
import type { SelectionRequest, SelectionStrategy } from "./strategies";

export interface SelectOptions {
  signal?: AbortSignal;
  runId?: string;
}

/**
 * Runs the primary strategy, then the fallback when the primary fails or
 * picks nothing. Never returns an empty plan.
 */
export class AgentSelector {
  private registry: AgentRegistry;
  private primary: SelectionStrategy;
  private fallback: SelectionStrategy;
  private log: Logger;

  constructor(
    registry: AgentRegistry,
    primary: SelectionStrategy,
    fallback: SelectionStrategy,
    logger: Logger,
  ) {
    this.registry = registry;
    this.primary = primary;
    this.fallback = fallback;
    this.log = logger;
  }

  async select(
    query: string,
    analysis: AnalysisResult | undefined,
    context: AgentContext,
    options: SelectOptions = {},
  ): Promise<SelectionPlan> {
    if (this.registry.isEmpty) {
      throw new NoAgentAvailableError("No agents are registered");
    }

    const request: SelectionRequest = {
      query,
      analysis,
      context,
      signal: options.signal,
      runId: options.runId,
    };

    let selected: string[] = [];
    try {
      selected = this.validate(await this.primary.select(request));
    } catch (err) {
      if (options.signal?.aborted) throw options.signal.reason;
      this.log.warn(`Primary selection (${this.primary.name}) failed: ${errorMessage(err)}`);
    }
    if (selected.length > 0) {
      return this.plan(selected, "oracle");
    }

    this.log.info(`Falling back to ${this.fallback.name} selection`);
    const fallback = this.validate(await this.fallback.select(request));
    if (fallback.length > 0) {
      return this.plan(fallback, "fallback");
    }

    throw new NoAgentAvailableError();
  }

  private validate(names: readonly string[]): string[] {
    const valid: string[] = [];
    for (const name of names) {
      if (!this.registry.has(name)) {
        this.log.warn(`Dropping unknown agent from selection: ${name}`);
        continue;
      }
      if (!valid.includes(name)) valid.push(name);
    }
    return valid;
  }

  private plan(agents: string[], source: SelectionSource): SelectionPlan {
    return Object.freeze({ agents: Object.freeze(agents), source });
  }
}
