/**
 * Structured logging for the agent stream.
 *
 * Uses pino. Components take a logger in their options and fall back to
 * a child of the root logger named after the component.
 */

import pino, { type DestinationStream, type Logger } from "pino";
import type { LogLevel } from "../types/config";
import { LogLevelSchema } from "../zod/config";

export type { Logger } from "pino";

const ROOT_NAME = "agent-stream";

let rootLogger: Logger | null = null;

/**
 * Create a standalone logger. Pass a destination to capture output.
 */
export function createLogger(
  level: LogLevel = "info",
  destination?: DestinationStream,
): Logger {
  const options = { name: ROOT_NAME, level };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Level named by AGENT_STREAM_LOG_LEVEL, or "info"
 */
export function logLevelFromEnv(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.AGENT_STREAM_LOG_LEVEL);
  return parsed.success ? parsed.data : "info";
}

/**
 * Shared root logger, created on first use
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(logLevelFromEnv());
  }
  return rootLogger;
}

/**
 * Replace the root logger (e.g. to silence it in tests)
 */
export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}

/**
 * Child logger for one component
 */
export function componentLogger(
  component: string,
  parent: Logger = getRootLogger(),
): Logger {
  return parent.child({ component });
}
