import type { AgentContext, AnalysisResult, Logger } from "@conductor/sdk";
import type { AgentRegistry } from "../agent/registry";
import { abortable } from "../abort";
import { errorMessage } from "../logger";
import { buildSelectionPrompt } from "./prompts";
import type { OracleClient } from "./oracle-client";

export interface SelectionRequest {
  query: string;
  analysis?: AnalysisResult;
  context: AgentContext;
  signal?: AbortSignal;
  runId?: string;
}

/** Produces candidate agent names in priority order. An empty list means "no opinion". */
export interface SelectionStrategy {
  readonly name: string;
  select(request: SelectionRequest): Promise<string[]>;
}

const MIN_CONTAINMENT_LENGTH = 3;

function cleanToken(token: string): string {
  return token
    .trim()
    .replace(/^(?:[-*•]|\d+[.)])\s*/, "")
    .replace(/^["'`*_]+|["'`*_.:;!?]+$/g, "")
    .trim();
}

/**
 * Maps one oracle token onto a registered agent name: exact match first,
 * then case-insensitive, then substring containment in either direction.
 */
export function matchAgentName(token: string, names: readonly string[]): string | undefined {
  const exact = names.find((name) => name === token);
  if (exact) return exact;

  const lower = token.toLowerCase();
  const caseless = names.find((name) => name.toLowerCase() === lower);
  if (caseless) return caseless;

  if (lower.length < MIN_CONTAINMENT_LENGTH) return undefined;
  return names.find((name) => {
    const candidate = name.toLowerCase();
    return lower.includes(candidate) || candidate.includes(lower);
  });
}

export function parseAgentList(response: string, names: readonly string[]): string[] {
  const selected: string[] = [];
  for (const raw of response.split(/[,\n]/)) {
    const token = cleanToken(raw);
    if (!token) continue;
    const match = matchAgentName(token, names);
    if (match && !selected.includes(match)) selected.push(match);
  }
  return selected;
}

export class OracleSelectionStrategy implements SelectionStrategy {
  readonly name = "oracle";
  private registry: AgentRegistry;
  private oracle: OracleClient;
  private log: Logger;

  constructor(registry: AgentRegistry, oracle: OracleClient, logger: Logger) {
    this.registry = registry;
    this.oracle = oracle;
    this.log = logger;
  }

  async select(request: SelectionRequest): Promise<string[]> {
    const prompt = buildSelectionPrompt(
      request.query,
      this.registry.list(),
      request.analysis,
      request.context,
    );
    const response = await this.oracle.complete("selection", prompt, {
      signal: request.signal,
      runId: request.runId,
    });

    const selected = parseAgentList(response, this.registry.names());
    if (selected.length === 0) {
      this.log.warn(`Oracle returned no known agent: ${JSON.stringify(response.trim())}`);
    } else {
      this.log.info(`Oracle selected agents: ${selected.join(", ")}`);
    }
    return selected;
  }
}

export class RuleSelectionStrategy implements SelectionStrategy {
  readonly name = "fallback";
  private registry: AgentRegistry;
  private maxAgents: number;
  private log: Logger;

  constructor(registry: AgentRegistry, maxAgents: number, logger: Logger) {
    this.registry = registry;
    this.maxAgents = maxAgents;
    this.log = logger;
  }

  async select(request: SelectionRequest): Promise<string[]> {
    const selected: string[] = [];

    for (const agent of this.registry.byPriority()) {
      if (selected.length >= this.maxAgents) break;

      let accepted = false;
      try {
        accepted = await abortable(
          () => agent.canHandle(request.query, request.context, request.signal),
          request.signal,
        );
      } catch (err) {
        if (request.signal?.aborted) throw request.signal.reason;
        this.log.warn(`canHandle failed for ${agent.name}: ${errorMessage(err)}`);
      }

      if (accepted === true) selected.push(agent.name);
    }

    if (selected.length > 0) {
      this.log.info(`Fallback selected agents: ${selected.join(", ")}`);
    }
    return selected;
  }
}
