import type { Logger } from "./logger";
import type { ConfigManager } from "./config";
import type { EventBus } from "./events";

export type PluginType = "oracle" | "agent" | "custom";

export interface PluginContext {
  config: ConfigManager;
  logger: Logger;
  events: EventBus;
}

export interface Plugin {
  readonly name: string;
  readonly version: string;
  readonly type: PluginType;

  init(context: PluginContext): Promise<void>;
  destroy(): Promise<void>;
}
