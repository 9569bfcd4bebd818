import type { ExecutionResult, Logger } from "@conductor/sdk";
import { AllAgentsFailedError, type AgentFailure } from "../errors";
import { errorMessage } from "../logger";
import { buildMergePrompt } from "./prompts";
import type { OracleCallOptions, OracleClient } from "./oracle-client";

export interface MergeOutcome {
  output: string;
  contributors: string[];
  /** True when the oracle merge was skipped or failed and outputs were concatenated. */
  degraded: boolean;
}

export function failuresOf(results: readonly ExecutionResult[]): AgentFailure[] {
  return results
    .filter((result) => result.status !== "success")
    .map((result) => ({
      agentName: result.agentName,
      status: result.status,
      message: result.error?.message ?? "unknown error",
    }));
}

export function concatenateResults(results: readonly ExecutionResult[]): string {
  const sections = results.map((result) => `### ${result.agentName}\n${result.output}\n\n`).join("");
  return `## Combined Results\n\n${sections}`.trimEnd();
}

export class ResultMerger {
  private oracle: OracleClient;
  private log: Logger;

  constructor(oracle: OracleClient, logger: Logger) {
    this.oracle = oracle;
    this.log = logger;
  }

  async merge(
    results: readonly ExecutionResult[],
    query: string,
    options: OracleCallOptions = {},
  ): Promise<MergeOutcome> {
    const succeeded = results.filter((result) => result.status === "success");
    const contributors = succeeded.map((result) => result.agentName);

    const [only] = succeeded;
    if (succeeded.length === 0 || !only) {
      throw new AllAgentsFailedError(failuresOf(results));
    }

    if (succeeded.length === 1) {
      return { output: only.output, contributors, degraded: false };
    }

    if (options.signal?.aborted) {
      this.log.warn("Run deadline reached before merging; concatenating agent outputs");
      return { output: concatenateResults(succeeded), contributors, degraded: true };
    }

    try {
      const merged = await this.oracle.complete("merge", buildMergePrompt(query, succeeded), options);
      return { output: merged.trim(), contributors, degraded: false };
    } catch (err) {
      this.log.warn(`Merge failed, concatenating ${succeeded.length} outputs: ${errorMessage(err)}`);
      return { output: concatenateResults(succeeded), contributors, degraded: true };
    }
  }
}
