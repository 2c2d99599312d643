/* eslint-disable no-console */
import type { Logger } from "./core.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

/** `LOG_LEVEL` wins; otherwise `DEBUG` turns on debug output. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env["LOG_LEVEL"]?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return env["DEBUG"] ? "debug" : "info";
}

export function createConsoleLogger(
  namespace: string,
  level: LogLevel = resolveLogLevel(),
): Logger {
  const prefix = `[${namespace}]`;
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    info(message: string, meta?: unknown): void {
      if (enabled("info")) console.info(prefix, message, meta ?? "");
    },
    warn(message: string, meta?: unknown): void {
      if (enabled("warn")) console.warn(prefix, message, meta ?? "");
    },
    error(message: string, meta?: unknown): void {
      if (enabled("error")) console.error(prefix, message, meta ?? "");
    },
    debug(message: string, meta?: unknown): void {
      if (enabled("debug")) console.debug(prefix, message, meta ?? "");
    },
  } satisfies Logger;
}
