import type { EventBus, Logger, Oracle, OracleStage } from "@conductor/sdk";
import { abortable } from "../abort";
import { OracleUnavailableError } from "../errors";
import { errorMessage } from "../logger";
import { publish } from "../event-bus";

export interface OracleCallOptions {
  signal?: AbortSignal;
  runId?: string;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Wraps the raw oracle with cancellation, usage reporting and error
 * normalisation. Transport failures surface as `OracleUnavailableError`;
 * when the caller's signal has aborted, its reason is rethrown instead.
 */
export class OracleClient {
  private oracle: Oracle;
  private events: EventBus;
  private log: Logger;

  constructor(oracle: Oracle, events: EventBus, logger: Logger) {
    this.oracle = oracle;
    this.events = events;
    this.log = logger;
  }

  async complete(stage: OracleStage, prompt: string, options: OracleCallOptions = {}): Promise<string> {
    const { signal, runId } = options;
    const started = Date.now();
    let response: string | undefined;
    let failure: unknown;

    try {
      response = await abortable(() => this.oracle.complete(prompt, { signal }), signal);
      if (typeof response !== "string") {
        throw new TypeError(`Oracle returned ${typeof response} instead of text`);
      }
      return response;
    } catch (err) {
      failure = err;
      if (signal?.aborted) throw signal.reason;
      this.log.warn(`Oracle call for ${stage} failed: ${errorMessage(err)}`);
      throw new OracleUnavailableError(`Oracle unavailable during ${stage}: ${errorMessage(err)}`, err);
    } finally {
      await this.report({
        stage,
        runId,
        durationMs: Date.now() - started,
        prompt,
        response: typeof response === "string" ? response : "",
        failure,
        signal,
      });
    }
  }

  private async report(call: {
    stage: OracleStage;
    runId?: string;
    durationMs: number;
    prompt: string;
    response: string;
    failure: unknown;
    signal?: AbortSignal;
  }): Promise<void> {
    await publish(
      this.events,
      "oracle:complete",
      {
        runId: call.runId,
        stage: call.stage,
        durationMs: call.durationMs,
        promptTokens: estimateTokens(call.prompt),
        completionTokens: estimateTokens(call.response),
        error: call.failure === undefined ? undefined : errorMessage(call.failure),
      },
      call.signal,
      this.log,
    );
  }
}
