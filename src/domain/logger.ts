// src/domain/logger.ts
import pino from "pino";
import type { Logger } from "pino";

function resolveLevel(): string {
  if (typeof process !== "undefined" && process.env?.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return "info";
}

/**
 * Shared structured logger. Modules take a child with their own
 * `module` binding rather than logging through this one directly.
 */
export const logger: Logger = pino({
  name: "mortgage-planner",
  level: resolveLevel(),
});

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
