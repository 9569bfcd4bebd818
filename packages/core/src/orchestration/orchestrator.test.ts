import { describe, it, expect } from "vitest";
import type { OracleStage, OrchestratorOptions, OrchestratorState } from "@conductor/sdk";
import { Orchestrator } from "./orchestrator";
import { AgentRegistry } from "../agent/registry";
import { TypedEventBus } from "../event-bus";
import {
  AllAgentsFailedError,
  CancelledError,
  ConfigError,
  DeadlineExceededError,
  NoAgentAvailableError,
} from "../errors";
import { MAX_TIMER_MS } from "../config";
import { FakeAgent, ScriptedOracle, sleep, stageOracle, type FakeAgentBehavior, type StageScript } from "../__tests__/fakes";

function docsAgent(behavior: FakeAgentBehavior = {}) {
  return new FakeAgent("DocsAgent", "retrieves documents", behavior);
}

function toolAgent(behavior: FakeAgentBehavior = {}) {
  return new FakeAgent("ToolAgent", "invokes external tools", behavior);
}

function build(
  agents: FakeAgent[],
  script: StageScript | ScriptedOracle,
  options: Partial<OrchestratorOptions> = {},
) {
  const events = new TypedEventBus();
  const states: OrchestratorState[] = [];
  const oracleStages: OracleStage[] = [];
  events.on("orchestrator:state", (event) => {
    states.push(event.to);
  });
  events.on("oracle:complete", (event) => {
    oracleStages.push(event.stage);
  });
  const oracle = script instanceof ScriptedOracle ? script : stageOracle(script);
  const orchestrator = new Orchestrator({
    registry: new AgentRegistry(agents),
    oracle,
    events,
    options,
  });
  return { orchestrator, oracle, states, oracleStages, events };
}

const analysis = () => "intent: search\nentities: manual";

describe("Orchestrator", () => {
  it("routes to the oracle's single choice and passes its output through", async () => {
    const docs = docsAgent({ output: "1. Download\n2. Install" });
    const tools = toolAgent();
    const { orchestrator, states, oracleStages } = build([docs, tools], {
      analysis,
      selection: () => "DocsAgent",
    });

    const result = await orchestrator.run("search the manual for installation steps", { lang: "en" });

    expect(result.output).toBe("1. Download\n2. Install");
    expect(result.contributingAgents).toEqual(["DocsAgent"]);
    expect(result.plan).toEqual({ agents: ["DocsAgent"], source: "oracle" });
    expect(result.analysis).toEqual({ intent: "search", entities: ["manual"], complexity: "medium" });
    expect(result.degraded).toBe(false);
    expect(result.results).toHaveLength(1);
    expect(docs.contexts).toEqual([{ lang: "en" }]);
    expect(tools.queries).toEqual([]);
    expect(states).toEqual(["analyzing", "selecting", "executing", "merging", "done"]);
    expect(oracleStages).toEqual(["analysis", "selection"]);
  });

  it("falls back to predicates when selection fails", async () => {
    const { orchestrator } = build([docsAgent({ canHandle: true }), toolAgent({ canHandle: false })], {
      analysis,
    });

    const result = await orchestrator.run("search the manual");

    expect(result.plan).toEqual({ agents: ["DocsAgent"], source: "fallback" });
    expect(result.output).toBe("DocsAgent answer");
    expect(result.degraded).toBe(true);
  });

  it("merges several successful agents through the oracle", async () => {
    const { orchestrator, oracle, oracleStages } = build(
      [docsAgent({ output: "Docs say X." }), toolAgent({ output: "Tool says Y." })],
      { analysis, selection: () => "DocsAgent, ToolAgent", merge: () => "X and Y." },
    );

    const result = await orchestrator.run("what is the status");

    expect(result.output).toBe("X and Y.");
    expect(result.contributingAgents).toEqual(["DocsAgent", "ToolAgent"]);
    expect(result.degraded).toBe(false);
    expect(oracle.prompts[2]).toContain("[DocsAgent]\nDocs say X.\n\n[ToolAgent]\nTool says Y.");
    expect(oracleStages).toEqual(["analysis", "selection", "merge"]);
  });

  it("concatenates outputs when the merge oracle fails", async () => {
    const { orchestrator } = build([docsAgent(), toolAgent()], {
      analysis,
      selection: () => "DocsAgent, ToolAgent",
    });

    const result = await orchestrator.run("what is the status");

    expect(result.output).toBe(
      "## Combined Results\n\n### DocsAgent\nDocsAgent answer\n\n### ToolAgent\nToolAgent answer",
    );
    expect(result.contributingAgents).toEqual(["DocsAgent", "ToolAgent"]);
    expect(result.degraded).toBe(true);
  });

  it("fails fast on an empty registry without calling the oracle", async () => {
    const { orchestrator, oracle, states } = build([], { analysis, selection: () => "DocsAgent" });

    await expect(orchestrator.run("anything")).rejects.toBeInstanceOf(NoAgentAvailableError);
    expect(oracle.prompts).toEqual([]);
    expect(states).toEqual(["failed"]);
  });

  it("degrades instead of aborting when analysis is unavailable", async () => {
    const { orchestrator, oracle } = build([docsAgent()], { selection: () => "DocsAgent" });

    const result = await orchestrator.run("find the report");

    expect(result.analysis).toBeUndefined();
    expect(result.plan.source).toBe("oracle");
    expect(result.degraded).toBe(true);
    expect(oracle.prompts[1]).not.toContain("Intent:");
  });

  it("skips analysis entirely when disabled", async () => {
    const { orchestrator, oracleStages } = build(
      [docsAgent()],
      { selection: () => "DocsAgent" },
      { analyzeQueries: false },
    );

    const result = await orchestrator.run("find the report");

    expect(result.degraded).toBe(false);
    expect(oracleStages).toEqual(["selection"]);
  });

  it("reports NoAgentAvailable and ends in the failed state", async () => {
    const { orchestrator, states } = build([docsAgent(), toolAgent()], { analysis, selection: () => "none" });

    await expect(orchestrator.run("hello")).rejects.toBeInstanceOf(NoAgentAvailableError);
    expect(states).toEqual(["analyzing", "selecting", "failed"]);
  });

  it("surfaces AllAgentsFailed with per-agent diagnostics", async () => {
    const { orchestrator } = build([docsAgent({ fail: "index offline" }), toolAgent({ fail: "401" })], {
      analysis,
      selection: () => "DocsAgent, ToolAgent",
    });

    const error = await orchestrator.run("q").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AllAgentsFailedError);
    expect(error).toMatchObject({
      failures: [
        { agentName: "DocsAgent", message: "index offline" },
        { agentName: "ToolAgent", message: "401" },
      ],
    });
  });

  it("returns partial results when the deadline hits after a success", async () => {
    const { orchestrator } = build(
      [docsAgent({ output: "fast answer" }), toolAgent({ delayMs: 1_000 })],
      { analysis, selection: () => "DocsAgent, ToolAgent", merge: () => "should not be used" },
      { deadlineMs: 80 },
    );

    const started = Date.now();
    const result = await orchestrator.run("q");

    expect(Date.now() - started).toBeLessThan(800);
    expect(result.output).toBe("fast answer");
    expect(result.contributingAgents).toEqual(["DocsAgent"]);
    expect(result.degraded).toBe(true);
    expect(result.results[1]?.status).not.toBe("success");
  });

  it("fails with DeadlineExceeded when nothing finished in time", async () => {
    const { orchestrator, states } = build(
      [docsAgent({ delayMs: 1_000 })],
      { analysis, selection: () => "DocsAgent" },
      { deadlineMs: 60 },
    );

    const error = await orchestrator.run("q").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeadlineExceededError);
    expect(error).toMatchObject({ code: "DEADLINE_EXCEEDED", failures: [{ agentName: "DocsAgent" }] });
    expect(states.at(-1)).toBe("failed");
  });

  it("fails with DeadlineExceeded when the oracle hangs past the deadline", async () => {
    const hanging = new ScriptedOracle(() => new Promise<string>(() => undefined));
    const { orchestrator } = build([docsAgent()], hanging, { deadlineMs: 40 });

    await expect(orchestrator.run("q")).rejects.toBeInstanceOf(DeadlineExceededError);
  });

  it("honours a per-run deadline override", async () => {
    const { orchestrator } = build(
      [docsAgent({ delayMs: 1_000 })],
      { analysis, selection: () => "DocsAgent" },
      { deadlineMs: 60_000 },
    );

    await expect(orchestrator.run("q", {}, { deadlineMs: 50 })).rejects.toBeInstanceOf(DeadlineExceededError);
    await expect(orchestrator.run("q", {}, { deadlineMs: 0 })).rejects.toBeInstanceOf(ConfigError);
  });

  it("finishes within the deadline when the observability sink is slow", async () => {
    const { orchestrator, events } = build(
      [docsAgent({ delayMs: 10 })],
      { analysis, selection: () => "DocsAgent" },
      { deadlineMs: 100 },
    );
    events.on("agent:execution:complete", () => sleep(600));

    const started = Date.now();
    const result = await orchestrator.run("q");

    expect(Date.now() - started).toBeLessThan(400);
    expect(result.output).toBe("DocsAgent answer");
    expect(result.degraded).toBe(true);
  });

  it("concatenates when the merge oracle hangs past the deadline", async () => {
    const { orchestrator } = build(
      [docsAgent(), toolAgent()],
      { analysis, selection: () => "DocsAgent, ToolAgent", merge: () => new Promise<string>(() => undefined) },
      { deadlineMs: 80 },
    );

    const started = Date.now();
    const result = await orchestrator.run("q");

    expect(Date.now() - started).toBeLessThan(500);
    expect(result.output).toBe(
      "## Combined Results\n\n### DocsAgent\nDocsAgent answer\n\n### ToolAgent\nToolAgent answer",
    );
    expect(result.contributingAgents).toEqual(["DocsAgent", "ToolAgent"]);
    expect(result.degraded).toBe(true);
  });

  it("reports the deadline, not a missing agent, when a predicate hangs", async () => {
    const { orchestrator } = build(
      [docsAgent({ canHandle: () => new Promise<boolean>(() => undefined) })],
      { analysis },
      { deadlineMs: 50 },
    );

    await expect(orchestrator.run("q")).rejects.toBeInstanceOf(DeadlineExceededError);
  });

  it("rejects deadlines longer than a timer can hold", async () => {
    const { orchestrator } = build([docsAgent({ delayMs: 30 })], { analysis, selection: () => "DocsAgent" });

    await expect(orchestrator.run("q", {}, { deadlineMs: MAX_TIMER_MS + 1 })).rejects.toBeInstanceOf(ConfigError);
    expect(
      () =>
        new Orchestrator({
          registry: new AgentRegistry([docsAgent()]),
          oracle: stageOracle({}),
          options: { deadlineMs: 2 ** 31 },
        }),
    ).toThrow(ConfigError);
  });

  it("fails with Cancelled when the caller aborts before any result", async () => {
    const controller = new AbortController();
    const { orchestrator } = build([docsAgent({ delayMs: 1_000 })], { analysis, selection: () => "DocsAgent" });

    setTimeout(() => controller.abort(), 30);
    const error = await orchestrator.run("q", {}, { signal: controller.signal }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CancelledError);
    expect(error).toMatchObject({ code: "CANCELLED", failures: [{ agentName: "DocsAgent", status: "error" }] });
  });

  it("does not start when the caller's signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const { orchestrator, oracle } = build([docsAgent()], { analysis, selection: () => "DocsAgent" });

    await expect(orchestrator.run("q", {}, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(oracle.prompts).toEqual([]);
  });

  it("produces identical output for identical runs", async () => {
    const { orchestrator } = build([docsAgent({ output: "A" }), toolAgent({ output: "B" })], {
      analysis,
      selection: () => "ToolAgent, DocsAgent",
      merge: (prompt) => `merged ${prompt.length}`,
    });

    const first = await orchestrator.run("same query", { user: "test-user" });
    const second = await orchestrator.run("same query", { user: "test-user" });

    expect(second.output).toBe(first.output);
    expect(first.plan.agents).toEqual(["ToolAgent", "DocsAgent"]);
  });

  it("keeps concurrent runs independent", async () => {
    const { orchestrator } = build([docsAgent({ delayMs: 20 }), toolAgent({ delayMs: 10 })], {
      analysis,
      selection: (prompt) => (prompt.includes("Query: docs") ? "DocsAgent" : "ToolAgent"),
    });

    const [docs, tools] = await Promise.all([orchestrator.run("docs"), orchestrator.run("tools")]);

    expect(docs.contributingAgents).toEqual(["DocsAgent"]);
    expect(tools.contributingAgents).toEqual(["ToolAgent"]);
  });

  it("validates its options", () => {
    expect(
      () => new Orchestrator({ registry: new AgentRegistry(), oracle: stageOracle({}), options: { maxConcurrency: 0 } }),
    ).toThrow(ConfigError);
  });
});
