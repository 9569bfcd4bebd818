import type { Agent, AgentRegistration } from "@conductor/sdk";
import { InvalidRegistrationError } from "../errors";

interface RegistryEntry {
  readonly agent: Agent;
  readonly priority: number;
  readonly index: number;
}

function validateAgent(agent: unknown): agent is Agent {
  if (agent === null || typeof agent !== "object") return false;
  return (
    "name" in agent &&
    typeof agent.name === "string" &&
    agent.name.trim().length > 0 &&
    "description" in agent &&
    typeof agent.description === "string" &&
    "canHandle" in agent &&
    typeof agent.canHandle === "function" &&
    "execute" in agent &&
    typeof agent.execute === "function"
  );
}

/**
 * Read-only set of agents, fixed at construction. Safe to share between
 * concurrent runs.
 */
export class AgentRegistry {
  private readonly entries: readonly RegistryEntry[];
  private readonly byName: ReadonlyMap<string, RegistryEntry>;
  private readonly prioritized: readonly Agent[];

  constructor(registrations: Iterable<AgentRegistration | Agent> = []) {
    const entries: RegistryEntry[] = [];
    const byName = new Map<string, RegistryEntry>();

    for (const registration of registrations) {
      const { agent, priority } =
        "agent" in registration ? registration : { agent: registration, priority: undefined };

      if (!validateAgent(agent)) {
        throw new InvalidRegistrationError(
          "Agent must have a non-empty name, a description, canHandle() and execute()",
        );
      }
      if (byName.has(agent.name)) {
        throw new InvalidRegistrationError(`Duplicate agent name: ${agent.name}`);
      }
      if (priority !== undefined && !Number.isFinite(priority)) {
        throw new InvalidRegistrationError(`Invalid priority for agent ${agent.name}`);
      }

      const entry: RegistryEntry = Object.freeze({
        agent,
        priority: priority ?? 0,
        index: entries.length,
      });
      entries.push(entry);
      byName.set(agent.name, entry);
    }

    this.entries = Object.freeze(entries);
    this.byName = byName;
    this.prioritized = Object.freeze(
      [...entries]
        .sort((a, b) => b.priority - a.priority || a.index - b.index)
        .map((entry) => entry.agent),
    );
  }

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  get(name: string): Agent | undefined {
    return this.byName.get(name)?.agent;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  priorityOf(name: string): number | undefined {
    return this.byName.get(name)?.priority;
  }

  /** Agents in registration order. */
  list(): readonly Agent[] {
    return this.entries.map((entry) => entry.agent);
  }

  /** Agents in fallback order: highest priority first, ties by registration order. */
  byPriority(): readonly Agent[] {
    return this.prioritized;
  }

  names(): string[] {
    return this.entries.map((entry) => entry.agent.name);
  }
}
