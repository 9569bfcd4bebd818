import type {
  Agent,
  AgentContext,
  AgentRegistration,
  OrchestrationResult,
  Oracle,
  OrchestratorOptions,
  Plugin,
  PluginContext,
  RunOptions,
} from "@conductor/sdk";
import { Config, resolveLogLevel, resolveOrchestratorOptions } from "./config";
import { createLogger, setLogLevel } from "./logger";
import { TypedEventBus } from "./event-bus";
import { AgentRegistry } from "./agent/registry";
import { Orchestrator } from "./orchestration/orchestrator";

export interface RuntimeSetup {
  agents: Iterable<AgentRegistration | Agent>;
  oracle: Oracle;
  /** Applied over the `[orchestrator]` section of the config file. */
  options?: Partial<OrchestratorOptions>;
}

export function isPlugin(value: unknown): value is Plugin {
  if (value === null || typeof value !== "object") return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "version" in value &&
    typeof value.version === "string" &&
    "type" in value &&
    typeof value.type === "string" &&
    "init" in value &&
    typeof value.init === "function" &&
    "destroy" in value &&
    typeof value.destroy === "function"
  );
}

/**
 * Composes config, logging, the event bus, the oracle plugin and the agent
 * registry into a ready orchestrator.
 */
export class Runtime {
  readonly events = new TypedEventBus();
  private config = new Config();
  private setup: RuntimeSetup;
  private orchestrator: Orchestrator | undefined;
  private booting: Promise<Orchestrator> | undefined;
  private plugins: Plugin[] = [];
  private log = createLogger("runtime");
  private shutdownRequested = false;

  constructor(setup: RuntimeSetup) {
    this.setup = setup;
  }

  get isReady(): boolean {
    return this.orchestrator !== undefined && !this.shutdownRequested;
  }

  /** Boots once; concurrent callers share the same boot. A shut-down runtime cannot be booted again. */
  async boot(configPath?: string): Promise<Orchestrator> {
    if (this.shutdownRequested) {
      throw new Error("Runtime has been shut down; create a new Runtime");
    }
    if (!this.booting) {
      this.booting = this.start(configPath);
      this.booting.catch(() => {
        this.booting = undefined;
      });
    }
    return this.booting;
  }

  private async start(configPath?: string): Promise<Orchestrator> {
    this.log.info("Booting Conductor runtime...");

    if (configPath) {
      this.config = await Config.fromFile(configPath);
      this.log.info(`Config loaded from ${configPath}`);
    }

    const logLevel = resolveLogLevel(this.config);
    if (logLevel) setLogLevel(logLevel);

    const options = resolveOrchestratorOptions(this.config, this.setup.options);
    const registry = new AgentRegistry(this.setup.agents);

    const oracle = this.setup.oracle;
    if (isPlugin(oracle)) {
      const context: PluginContext = {
        config: this.config,
        logger: createLogger(oracle.name),
        events: this.events,
      };
      await oracle.init(context);
      this.plugins.push(oracle);
      this.log.info(`Initialized plugin: ${oracle.name} v${oracle.version}`);
    }

    this.orchestrator = new Orchestrator({ registry, oracle, events: this.events, options });
    await this.events.emit("runtime:ready", {});

    this.log.info(`Conductor runtime is ready (${registry.size} agent(s))`);
    return this.orchestrator;
  }

  async run(query: string, context?: AgentContext, options?: RunOptions): Promise<OrchestrationResult> {
    if (!this.orchestrator || this.shutdownRequested) {
      throw new Error("Runtime is not running; call boot() first");
    }
    return this.orchestrator.run(query, context, options);
  }

  async shutdown(): Promise<void> {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;

    this.log.info("Shutting down...");
    await this.events.emit("runtime:shutdown", {});

    for (const plugin of [...this.plugins].reverse()) {
      try {
        await plugin.destroy();
        this.log.info(`Destroyed plugin: ${plugin.name}`);
      } catch (err) {
        this.log.error(`Failed to destroy plugin "${plugin.name}":`, err);
      }
    }

    this.plugins = [];
    this.orchestrator = undefined;
    this.booting = undefined;
    this.events.removeAll();
    this.log.info("Shutdown complete");
  }
}
