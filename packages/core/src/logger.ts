import { createConsola, LogLevels } from "consola";
import type { Logger, LogLevel } from "@conductor/sdk";

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  debug: LogLevels.debug,
  info: LogLevels.info,
  warn: LogLevels.warn,
  error: LogLevels.error,
  silent: LogLevels.silent,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_MAP, value);
}

const envLevel = process.env.CONDUCTOR_LOG_LEVEL;

const consola = createConsola({
  level: envLevel && isLogLevel(envLevel) ? LOG_LEVEL_MAP[envLevel] : LogLevels.info,
});

export function setLogLevel(level: LogLevel): void {
  consola.level = LOG_LEVEL_MAP[level];
}

export function createLogger(tag?: string): Logger {
  const instance = tag ? consola.withTag(tag) : consola;
  return {
    debug: (message: string, ...args: unknown[]) => instance.debug(message, ...args),
    info: (message: string, ...args: unknown[]) => instance.info(message, ...args),
    warn: (message: string, ...args: unknown[]) => instance.warn(message, ...args),
    error: (message: string, ...args: unknown[]) => instance.error(message, ...args),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
