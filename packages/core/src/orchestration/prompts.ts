import type { Agent, AgentContext, AnalysisResult, ExecutionResult } from "@conductor/sdk";

export const INTENT_CATEGORIES = {
  search: "Finding or retrieving information",
  analyze: "Analyzing, summarizing, or processing data",
  create: "Creating, generating, or building something",
  general: "General conversation or unclear intent",
} as const;

export function buildAnalysisPrompt(query: string): string {
  const categories = Object.entries(INTENT_CATEGORIES)
    .map(([name, description]) => `- ${name}: ${description}`)
    .join("\n");

  return `Analyze the user's query.

1. Pick exactly ONE intent category:
${categories}

2. Extract the key entities (file types, data types, tools, services, locations, dates, etc.).

Query: ${query}

Answer with exactly two lines and nothing else:
intent: <category>
entities: <comma-separated values, or none>`;
}

function formatContextValue(value: unknown): string {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return `[${typeof value}]`;
  }
}

export function formatContext(context: AgentContext): string {
  return Object.entries(context)
    .map(([key, value]) => `${key}=${formatContextValue(value)}`)
    .join("; ");
}

export function buildSelectionPrompt(
  query: string,
  agents: readonly Agent[],
  analysis: AnalysisResult | undefined,
  context: AgentContext,
): string {
  const lines = [
    "Based on the query, select the most appropriate agents to answer it.",
    "",
    `Query: ${query}`,
  ];

  if (analysis) {
    lines.push(
      `Intent: ${analysis.intent}`,
      `Entities: ${analysis.entities.length > 0 ? analysis.entities.join(", ") : "None"}`,
      `Complexity: ${analysis.complexity}`,
    );
  }

  if (Object.keys(context).length > 0) {
    lines.push(`Context: ${formatContext(context)}`);
  }

  lines.push(
    "",
    "Available Agents:",
    ...agents.map((agent) => `- ${agent.name}: ${agent.description}`),
    "",
    'Return ONLY the agent names as comma-separated values (e.g., "AgentA, AgentB"):',
  );

  return lines.join("\n");
}

export function buildMergePrompt(query: string, results: readonly ExecutionResult[]): string {
  const sections = results.map((result) => `[${result.agentName}]\n${result.output}`).join("\n\n");

  return `Several agents answered the same user query. Combine their results into one coherent answer.
Keep every relevant fact, remove duplication, and resolve contradictions by preferring the more specific result.
Do not mention the agents.

Query: ${query}

${sections}

Answer:`;
}
