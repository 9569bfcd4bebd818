import { parse } from "smol-toml";
import { z } from "zod";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join, dirname } from "node:path";
import type { ConfigManager, LogLevel, OrchestratorOptions } from "@conductor/sdk";
import { ConfigError } from "./errors";

const DEFAULT_CONFIG = `# Conductor configuration

[orchestrator]
# deadlineMs = 60000
# agentTimeoutMs = 30000
# maxConcurrency = 5
# maxFallbackAgents = 3
# strategy = "parallel"    # or "sequential"
# analyzeQueries = true

# [plugins."@conductor/oracle-openaigeneric"]
# apiKey = "\${OPENAI_API_KEY}"
# baseUrl = "https://api.openai.com/v1"
# defaultModel = "gpt-4o-mini"

[runtime]
# logLevel = "info"
`;

export const DEFAULT_ORCHESTRATOR_OPTIONS: Readonly<OrchestratorOptions> = Object.freeze({
  deadlineMs: 60_000,
  agentTimeoutMs: 30_000,
  maxConcurrency: 5,
  maxFallbackAgents: 3,
  strategy: "parallel",
  analyzeQueries: true,
});

/** Longest delay `setTimeout` honours; larger values fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647;

const orchestratorSchema = z
  .object({
    deadlineMs: z.number().int().positive().max(MAX_TIMER_MS),
    agentTimeoutMs: z.number().int().positive().max(MAX_TIMER_MS),
    maxConcurrency: z.number().int().min(1),
    maxFallbackAgents: z.number().int().min(1),
    strategy: z.enum(["parallel", "sequential"]),
    analyzeQueries: z.boolean(),
  })
  .partial()
  .strict();

const runtimeSchema = z
  .object({
    logLevel: z.enum(["debug", "info", "warn", "error", "silent"]),
  })
  .partial();

function applyOptions(
  base: Readonly<OrchestratorOptions>,
  patch: Partial<OrchestratorOptions>,
): OrchestratorOptions {
  return {
    deadlineMs: patch.deadlineMs ?? base.deadlineMs,
    agentTimeoutMs: patch.agentTimeoutMs ?? base.agentTimeoutMs,
    maxConcurrency: patch.maxConcurrency ?? base.maxConcurrency,
    maxFallbackAgents: patch.maxFallbackAgents ?? base.maxFallbackAgents,
    strategy: patch.strategy ?? base.strategy,
    analyzeQueries: patch.analyzeQueries ?? base.analyzeQueries,
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Merges `[orchestrator]` from the config (when given), then `overrides`,
 * over the defaults. Every source is validated; the first invalid one throws.
 */
export function resolveOrchestratorOptions(
  config?: ConfigManager,
  overrides: Partial<OrchestratorOptions> = {},
): OrchestratorOptions {
  const fromConfig = orchestratorSchema.safeParse(config?.get("orchestrator") ?? {});
  if (!fromConfig.success) {
    throw new ConfigError("Invalid [orchestrator] configuration", formatIssues(fromConfig.error));
  }

  const fromOverrides = orchestratorSchema.safeParse(overrides);
  if (!fromOverrides.success) {
    throw new ConfigError("Invalid orchestrator options", formatIssues(fromOverrides.error));
  }

  return applyOptions(applyOptions(DEFAULT_ORCHESTRATOR_OPTIONS, fromConfig.data), fromOverrides.data);
}

export function resolveLogLevel(config: ConfigManager): LogLevel | undefined {
  const parsed = runtimeSchema.safeParse(config.get("runtime") ?? {});
  if (!parsed.success) {
    throw new ConfigError("Invalid [runtime] configuration", formatIssues(parsed.error));
  }
  return parsed.data.logLevel;
}

function getDefaultConfigDir(): string {
  if (process.platform === "win32") {
    const appData = process.env.APPDATA ?? join(process.env.USERPROFILE ?? "", "AppData", "Roaming");
    return join(appData, "conductor");
  }
  const xdg = process.env.XDG_CONFIG_HOME ?? join(process.env.HOME ?? "", ".config");
  return join(xdg, "conductor");
}

/**
 * Resolves the config file path with the following precedence:
 * 1. an explicit path (e.g. from a `--config` flag)
 * 2. `CONDUCTOR_CONFIG` environment variable
 * 3. OS default: Windows  → %APPDATA%/conductor/config.toml
 *                Linux/Mac → $XDG_CONFIG_HOME/conductor/config.toml
 */
export function resolveConfigPath(cliPath?: string): string {
  if (cliPath) return cliPath;
  if (process.env.CONDUCTOR_CONFIG) return process.env.CONDUCTOR_CONFIG;
  return join(getDefaultConfigDir(), "config.toml");
}

/**
 * Writes the commented default config when nothing exists at `path`.
 * Returns true if a new file was created.
 */
export async function ensureConfigFile(path: string): Promise<boolean> {
  if (existsSync(path)) return false;
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, DEFAULT_CONFIG, "utf-8");
  return true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export class Config implements ConfigManager {
  private data: Record<string, unknown>;

  constructor(data: Record<string, unknown> = {}) {
    this.data = data;
  }

  static async fromFile(path: string): Promise<Config> {
    const raw = await readFile(path, "utf-8");
    return Config.fromToml(raw);
  }

  static fromToml(raw: string): Config {
    let parsed: Record<string, unknown>;
    try {
      parsed = parse(raw);
    } catch (err) {
      throw new ConfigError(`Invalid TOML: ${err instanceof Error ? err.message : String(err)}`);
    }
    return new Config(Config.interpolateEnv(parsed));
  }

  get(key: string): unknown {
    return Config.resolve(this.data, key);
  }

  has(key: string): boolean {
    return Config.resolve(this.data, key) !== undefined;
  }

  getAll(): Record<string, unknown> {
    return structuredClone(this.data);
  }

  private static resolve(obj: Record<string, unknown>, key: string): unknown {
    let current: unknown = obj;
    for (const part of Config.parseDotPath(key)) {
      if (!isRecord(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Parses dot-notation paths with support for quoted keys.
   * e.g. 'plugins."@conductor/oracle-openaigeneric".apiKey'
   *   → ["plugins", "@conductor/oracle-openaigeneric", "apiKey"]
   */
  private static parseDotPath(key: string): string[] {
    const parts: string[] = [];
    let current = "";
    let quoteChar: string | undefined;

    for (const char of key) {
      if (quoteChar) {
        if (char === quoteChar) {
          quoteChar = undefined;
        } else {
          current += char;
        }
      } else if (char === '"' || char === "'") {
        quoteChar = char;
      } else if (char === ".") {
        if (current) parts.push(current);
        current = "";
      } else {
        current += char;
      }
    }
    if (current) parts.push(current);
    return parts;
  }

  private static interpolateEnv(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = Config.interpolateValue(value);
    }
    return result;
  }

  private static interpolateValue(value: unknown): unknown {
    if (typeof value === "string") {
      return value.replace(/\$\{(\w+)\}/g, (_, envVar: string) => process.env[envVar] ?? "");
    }
    if (Array.isArray(value)) {
      return value.map((item) => Config.interpolateValue(item));
    }
    if (isRecord(value)) {
      return Config.interpolateEnv(value);
    }
    return value;
  }
}
