// Configuration defaults and resolution

import { ZodError } from "zod";
import type { StreamConfig, StreamOptions } from "../types/config";
import { StreamConfigSchema } from "../zod/config";
import { StreamError, StreamErrorCodes } from "../utils/errors";

export const STREAM_DEFAULTS: StreamConfig = {
  deadlineMs: 30_000,
  waitTimeoutMs: 1_000,
  joinTimeoutMs: 5_000,
  queueCapacity: 1_000,
  lookahead: 20,
  markers: { open: "<thinking>", close: "</thinking>" },
  maxDebugEvents: 100,
  debug: false,
};

/**
 * Merge options over the defaults and validate the result.
 * @throws StreamError with code INVALID_CONFIG
 */
export function resolveConfig(options: StreamOptions = {}): StreamConfig {
  const merged = {
    ...STREAM_DEFAULTS,
    ...options,
    markers: { ...STREAM_DEFAULTS.markers, ...options.markers },
  };

  try {
    return StreamConfigSchema.parse(merged);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new StreamError(`Invalid stream configuration: ${issues}`, {
        code: StreamErrorCodes.INVALID_CONFIG,
        metadata: { issues: error.issues },
      });
    }
    throw error;
  }
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Read options from environment variables:
 *
 * - AGENT_STREAM_DEADLINE_MS
 * - AGENT_STREAM_WAIT_MS
 * - AGENT_STREAM_JOIN_MS
 * - AGENT_STREAM_LOOKAHEAD
 * - AGENT_STREAM_DEBUG ("1" or "true")
 *
 * Unset or unparseable values are left out, so defaults apply.
 */
export function optionsFromEnv(
  env: Record<string, string | undefined> = process.env,
): StreamOptions {
  const options: StreamOptions = {};

  const deadlineMs = readInt(env.AGENT_STREAM_DEADLINE_MS);
  if (deadlineMs !== undefined) options.deadlineMs = deadlineMs;

  const waitTimeoutMs = readInt(env.AGENT_STREAM_WAIT_MS);
  if (waitTimeoutMs !== undefined) options.waitTimeoutMs = waitTimeoutMs;

  const joinTimeoutMs = readInt(env.AGENT_STREAM_JOIN_MS);
  if (joinTimeoutMs !== undefined) options.joinTimeoutMs = joinTimeoutMs;

  const lookahead = readInt(env.AGENT_STREAM_LOOKAHEAD);
  if (lookahead !== undefined) options.lookahead = lookahead;

  const debug = env.AGENT_STREAM_DEBUG;
  if (debug !== undefined) {
    options.debug = debug === "1" || debug.toLowerCase() === "true";
  }

  return options;
}
