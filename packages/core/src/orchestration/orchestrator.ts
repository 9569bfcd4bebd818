import { randomUUID } from "node:crypto";
import type {
  AgentContext,
  AnalysisResult,
  EventBus,
  ExecutionResult,
  Logger,
  Oracle,
  OrchestrationResult,
  OrchestratorOptions,
  OrchestratorState,
  RunOptions,
} from "@conductor/sdk";
import type { AgentRegistry } from "../agent/registry";
import { ExecutionCoordinator } from "../agent/coordinator";
import { linkSignals } from "../abort";
import { MAX_TIMER_MS, resolveOrchestratorOptions } from "../config";
import {
  CancelledError,
  ConfigError,
  DeadlineExceededError,
  NoAgentAvailableError,
  type AgentFailure,
  type ConductorError,
} from "../errors";
import { TypedEventBus, publish } from "../event-bus";
import { createLogger, errorMessage } from "../logger";
import { failuresOf, ResultMerger } from "./merger";
import { OracleClient } from "./oracle-client";
import { QueryAnalyzer } from "./query-analyzer";
import { AgentSelector } from "./selector";
import { isTerminal, transition } from "./state-machine";
import { OracleSelectionStrategy, RuleSelectionStrategy, type SelectionStrategy } from "./strategies";

export interface OrchestratorDependencies {
  registry: AgentRegistry;
  oracle: Oracle;
  events?: EventBus;
  logger?: Logger;
  options?: Partial<OrchestratorOptions>;
  /** Replaces the oracle-based selection strategy. */
  primaryStrategy?: SelectionStrategy;
  /** Replaces the predicate-based fallback strategy. */
  fallbackStrategy?: SelectionStrategy;
}

class RunTracker {
  private current: OrchestratorState = "idle";
  /** Bounds how long state changes wait on event handlers. Set once the deadline exists. */
  signal: AbortSignal | undefined;

  constructor(
    private runId: string,
    private events: EventBus,
    private log: Logger,
  ) {}

  get state(): OrchestratorState {
    return this.current;
  }

  async advance(to: OrchestratorState): Promise<void> {
    const from = this.current;
    this.current = transition(from, to);
    this.log.debug(`Run ${this.runId}: ${from} -> ${to}`);
    await publish(this.events, "orchestrator:state", { runId: this.runId, from, to }, this.signal, this.log);
  }

  async fail(): Promise<void> {
    if (!isTerminal(this.current)) {
      await this.advance("failed");
    }
  }
}

/**
 * Facade over analysis, selection, execution and merging. One `run` call is
 * one pass through `idle → analyzing → selecting → executing → merging → done`,
 * bounded by a single deadline.
 */
export class Orchestrator {
  readonly registry: AgentRegistry;
  readonly options: Readonly<OrchestratorOptions>;
  private events: EventBus;
  private log: Logger;
  private analyzer: QueryAnalyzer;
  private selector: AgentSelector;
  private coordinator: ExecutionCoordinator;
  private merger: ResultMerger;

  constructor(deps: OrchestratorDependencies) {
    this.registry = deps.registry;
    this.options = Object.freeze(resolveOrchestratorOptions(undefined, deps.options));
    this.events = deps.events ?? new TypedEventBus();
    this.log = deps.logger ?? createLogger("orchestrator");

    const oracle = new OracleClient(deps.oracle, this.events, createLogger("oracle"));
    this.analyzer = new QueryAnalyzer(oracle, createLogger("analyzer"));
    this.selector = new AgentSelector(
      this.registry,
      deps.primaryStrategy ?? new OracleSelectionStrategy(this.registry, oracle, createLogger("selector")),
      deps.fallbackStrategy ??
        new RuleSelectionStrategy(this.registry, this.options.maxFallbackAgents, createLogger("selector")),
      createLogger("selector"),
    );
    this.coordinator = new ExecutionCoordinator(this.registry, this.events, createLogger("coordinator"), {
      agentTimeoutMs: this.options.agentTimeoutMs,
      maxConcurrency: this.options.maxConcurrency,
      strategy: this.options.strategy,
    });
    this.merger = new ResultMerger(oracle, createLogger("merger"));

    this.log.info(`Orchestrator initialized with ${this.registry.size} agent(s)`);
  }

  async run(
    query: string,
    context: AgentContext = {},
    runOptions: RunOptions = {},
  ): Promise<OrchestrationResult> {
    const runId = randomUUID();
    const started = Date.now();
    const run = new RunTracker(runId, this.events, this.log);

    if (this.registry.isEmpty) {
      await run.fail();
      throw new NoAgentAvailableError("No agents are registered");
    }

    const deadlineMs = runOptions.deadlineMs ?? this.options.deadlineMs;
    if (!Number.isFinite(deadlineMs) || deadlineMs <= 0 || deadlineMs > MAX_TIMER_MS) {
      await run.fail();
      throw new ConfigError(`Run deadline must be between 1 and ${MAX_TIMER_MS}ms, got ${deadlineMs}`);
    }

    const deadline = started + deadlineMs;
    const deadlineController = new AbortController();
    const timer = setTimeout(() => deadlineController.abort(new DeadlineExceededError(deadlineMs)), deadlineMs);
    const signal = linkSignals(runOptions.signal, deadlineController.signal);
    run.signal = signal;
    let results: readonly ExecutionResult[] = [];

    try {
      if (signal.aborted) throw signal.reason;

      let degraded = false;
      let analysis: AnalysisResult | undefined;

      await run.advance("analyzing");
      if (this.options.analyzeQueries) {
        try {
          analysis = await this.analyzer.analyze(query, { signal, runId });
        } catch (err) {
          if (signal.aborted) throw signal.reason;
          degraded = true;
          this.log.warn(`Query analysis skipped: ${errorMessage(err)}`);
        }
      }

      await run.advance("selecting");
      const plan = await this.selector.select(query, analysis, context, { signal, runId });
      if (plan.source === "fallback") degraded = true;
      this.log.info(`Run ${runId}: plan [${plan.agents.join(", ")}] from ${plan.source}`);

      await run.advance("executing");
      results = await this.coordinator.execute(plan, query, context, { deadline, signal, runId });

      const succeeded = results.filter((result) => result.status === "success").length;
      if (succeeded < results.length) degraded = true;
      if (signal.aborted || Date.now() >= deadline) {
        if (succeeded === 0) throw this.abortFailure(signal, deadlineMs, failuresOf(results));
        degraded = true;
        this.log.warn(`Run ${runId} interrupted; merging ${succeeded} completed result(s)`);
      }

      await run.advance("merging");
      const merged = await this.merger.merge(results, query, { signal, runId });

      await run.advance("done");
      const result: OrchestrationResult = {
        output: merged.output,
        contributingAgents: merged.contributors,
        totalDurationMs: Date.now() - started,
        degraded: degraded || merged.degraded,
        plan,
        analysis,
        results,
      };

      this.log.info(
        `Run ${runId} done in ${result.totalDurationMs}ms (agents: ${result.contributingAgents.join(", ")}${result.degraded ? ", degraded" : ""})`,
      );
      await this.reportCompletion(runId, result, signal);
      return result;
    } catch (err) {
      await run.fail();
      if (signal.aborted && err === signal.reason) {
        throw this.abortFailure(signal, deadlineMs, failuresOf(results));
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  private abortFailure(signal: AbortSignal, deadlineMs: number, failures: AgentFailure[]): ConductorError {
    if (signal.aborted && !(signal.reason instanceof DeadlineExceededError)) {
      return new CancelledError(failures, signal.reason);
    }
    return new DeadlineExceededError(deadlineMs, failures);
  }

  private async reportCompletion(runId: string, result: OrchestrationResult, signal: AbortSignal): Promise<void> {
    await publish(
      this.events,
      "orchestrator:run:complete",
      {
        runId,
        degraded: result.degraded,
        totalDurationMs: result.totalDurationMs,
        contributingAgents: result.contributingAgents,
      },
      signal,
      this.log,
    );
  }
}
