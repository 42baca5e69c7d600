/**
 * Structured logging using pino, one child per component.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LARDER_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.VITEST ? "silent" : "info";
}

let root: PinoLogger | null = null;

function getRootLogger(): PinoLogger {
  if (!root) {
    root = pino({ name: "larder", level: getLogLevel() }, pino.destination(2));
  }
  return root;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger("reconciler");
 * logger.info({ resource: "package.nginx" }, "Applied");
 * ```
 */
export function createLogger(component: string): PinoLogger {
  return getRootLogger().child({ component });
}

export type Logger = PinoLogger;
