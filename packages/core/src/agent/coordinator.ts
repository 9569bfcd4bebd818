import type {
  AgentContext,
  AgentExecution,
  EventBus,
  ExecutionError,
  ExecutionResult,
  Logger,
  OrchestrationStrategy,
  SelectionPlan,
} from "@conductor/sdk";
import type { AgentRegistry } from "./registry";
import { Semaphore } from "./semaphore";
import { abortable, linkSignals, remainingMs } from "../abort";
import { NoAgentAvailableError } from "../errors";
import { publish } from "../event-bus";
import { errorMessage } from "../logger";

export interface CoordinatorOptions {
  agentTimeoutMs: number;
  maxConcurrency: number;
  strategy: OrchestrationStrategy;
}

export interface ExecuteOptions {
  /** Absolute deadline (epoch ms) of the surrounding run. */
  deadline: number;
  /** Run-level cancellation. Aborting it cancels every in-flight agent. */
  signal?: AbortSignal;
  runId?: string;
}

function failure(
  agentName: string,
  error: ExecutionError,
  durationMs: number,
): ExecutionResult {
  const result: ExecutionResult = {
    agentName,
    status: error.kind === "timeout" ? "timeout" : "error",
    output: "",
    error,
    durationMs,
    toolCalls: Object.freeze([]),
  };
  return Object.freeze(result);
}

function success(agentName: string, execution: AgentExecution, durationMs: number): ExecutionResult {
  const result: ExecutionResult = {
    agentName,
    status: "success",
    output: typeof execution.output === "string" ? execution.output : String(execution.output),
    durationMs,
    toolCalls: Object.freeze([...(execution.toolCalls ?? [])]),
    usage: execution.usage,
  };
  return Object.freeze(result);
}

/**
 * Fans a query out to the planned agents. Each agent gets its own timeout
 * and abort signal; failures become results, never exceptions. Results are
 * index-aligned with the plan.
 */
export class ExecutionCoordinator {
  private registry: AgentRegistry;
  private events: EventBus;
  private log: Logger;
  private options: CoordinatorOptions;

  constructor(
    registry: AgentRegistry,
    events: EventBus,
    logger: Logger,
    options: CoordinatorOptions,
  ) {
    this.registry = registry;
    this.events = events;
    this.log = logger;
    this.options = options;
  }

  concurrencyFor(planLength: number): number {
    if (this.options.strategy === "sequential") return 1;
    return Math.max(1, Math.min(planLength, this.options.maxConcurrency));
  }

  async execute(
    plan: SelectionPlan,
    query: string,
    context: AgentContext,
    options: ExecuteOptions,
  ): Promise<ExecutionResult[]> {
    if (plan.agents.length === 0) {
      throw new NoAgentAvailableError("Cannot execute an empty selection plan");
    }

    const semaphore = new Semaphore(this.concurrencyFor(plan.agents.length));
    const slots: (ExecutionResult | undefined)[] = plan.agents.map(() => undefined);

    this.log.debug(
      `Dispatching ${plan.agents.length} agent(s) with concurrency ${this.concurrencyFor(plan.agents.length)}`,
    );

    await Promise.all(
      plan.agents.map(async (agentName, index) => {
        const release = await semaphore.acquire();
        let result: ExecutionResult;
        try {
          result = await this.invoke(agentName, query, context, options);
        } finally {
          release();
        }
        slots[index] = result;
        await this.report(result, options);
      }),
    );

    return slots.map(
      (result, index) =>
        result ??
        failure(plan.agents[index] ?? "unknown", { kind: "error", message: "Agent produced no result" }, 0),
    );
  }

  private async invoke(
    agentName: string,
    query: string,
    context: AgentContext,
    options: ExecuteOptions,
  ): Promise<ExecutionResult> {
    const agent = this.registry.get(agentName);
    if (!agent) {
      return failure(agentName, { kind: "error", message: `Unknown agent: ${agentName}` }, 0);
    }

    if (options.signal?.aborted) {
      return failure(agentName, { kind: "cancelled", message: "Run was cancelled before the agent started" }, 0);
    }

    const timeoutMs = Math.min(this.options.agentTimeoutMs, remainingMs(options.deadline));
    const timeoutReason = new Error(`Agent ${agentName} timed out after ${timeoutMs}ms`);
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(timeoutReason), timeoutMs);
    const signal = linkSignals(options.signal, timeout.signal);
    const started = Date.now();

    try {
      const execution = await abortable(() => agent.execute(query, context, signal), signal);
      return success(agentName, execution, Date.now() - started);
    } catch (err) {
      const durationMs = Date.now() - started;
      if (signal.aborted && signal.reason === timeoutReason) {
        return failure(agentName, { kind: "timeout", message: timeoutReason.message }, durationMs);
      }
      if (options.signal?.aborted) {
        return failure(agentName, { kind: "cancelled", message: errorMessage(options.signal.reason) }, durationMs);
      }
      return failure(agentName, { kind: "error", message: errorMessage(err) }, durationMs);
    } finally {
      clearTimeout(timer);
    }
  }

  private async report(result: ExecutionResult, options: ExecuteOptions): Promise<void> {
    if (result.status === "success") {
      this.log.info(`Agent ${result.agentName} completed in ${result.durationMs}ms`);
    } else {
      this.log.warn(`Agent ${result.agentName} ${result.status}: ${result.error?.message ?? "unknown error"}`);
    }

    await publish(
      this.events,
      "agent:execution:complete",
      {
        runId: options.runId ?? "",
        agentName: result.agentName,
        status: result.status,
        durationMs: result.durationMs,
        tokensIn: result.usage?.promptTokens ?? 0,
        tokensOut: result.usage?.completionTokens ?? 0,
        toolCalls: result.toolCalls,
        error: result.error,
      },
      options.signal,
      this.log,
    );
  }
}
