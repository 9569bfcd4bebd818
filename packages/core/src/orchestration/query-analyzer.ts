import type { AnalysisResult, Complexity, Intent, Logger } from "@conductor/sdk";
import { buildAnalysisPrompt, INTENT_CATEGORIES } from "./prompts";
import type { OracleCallOptions, OracleClient } from "./oracle-client";

const EMPTY_ENTITY_MARKERS = new Set(["", "none", "n/a", "na", "null"]);

function isIntent(value: string): value is Intent {
  return Object.hasOwn(INTENT_CATEGORIES, value);
}

function stripDecoration(value: string): string {
  return value.trim().replace(/^["'`*_\s]+|["'`*_.\s]+$/g, "");
}

export function normalizeIntent(raw: string | undefined): Intent {
  const candidate = stripDecoration(raw ?? "").toLowerCase();
  return isIntent(candidate) ? candidate : "general";
}

export function parseEntities(raw: string | undefined): string[] {
  const text = stripDecoration(raw ?? "");
  if (EMPTY_ENTITY_MARKERS.has(text.toLowerCase())) return [];
  return text
    .split(",")
    .map(stripDecoration)
    .filter((entity) => entity.length > 0);
}

export function assessComplexity(query: string): Complexity {
  const words = query.trim().split(/\s+/).filter(Boolean).length;
  if (words < 5) return "low";
  if (words < 15) return "medium";
  return "high";
}

/**
 * Reads the two-line `intent:` / `entities:` answer. Unlabelled answers are
 * read positionally.
 */
export function parseAnalysisResponse(response: string): Pick<AnalysisResult, "intent" | "entities"> {
  const lines = response
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  let intentText: string | undefined;
  let entitiesText: string | undefined;
  for (const line of lines) {
    const labelled = /^[-*\s]*(intent|entities)\s*[:=]\s*(.*)$/i.exec(line);
    if (!labelled) continue;
    const label = labelled[1]?.toLowerCase();
    if (label === "intent" && intentText === undefined) intentText = labelled[2];
    if (label === "entities" && entitiesText === undefined) entitiesText = labelled[2];
  }

  if (intentText === undefined && entitiesText === undefined) {
    intentText = lines[0];
    entitiesText = lines[1];
  }

  return {
    intent: normalizeIntent(intentText),
    entities: parseEntities(entitiesText),
  };
}

export class QueryAnalyzer {
  private oracle: OracleClient;
  private log: Logger;

  constructor(oracle: OracleClient, logger: Logger) {
    this.oracle = oracle;
    this.log = logger;
  }

  /**
   * Derives intent, entities and complexity for one query. Throws
   * `OracleUnavailableError` when the oracle cannot be reached.
   */
  async analyze(query: string, options: OracleCallOptions = {}): Promise<AnalysisResult> {
    const complexity = assessComplexity(query);

    if (query.trim().length === 0) {
      const empty: AnalysisResult = { intent: "general", entities: Object.freeze([]), complexity };
      return Object.freeze(empty);
    }

    const response = await this.oracle.complete("analysis", buildAnalysisPrompt(query), options);
    const { intent, entities } = parseAnalysisResponse(response);

    this.log.info(`Query analysis: intent=${intent}, entities=${entities.length}, complexity=${complexity}`);
    const result: AnalysisResult = { intent, entities: Object.freeze(entities), complexity };
    return Object.freeze(result);
  }
}
