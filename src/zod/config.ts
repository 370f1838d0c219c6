// Zod schemas for stream configuration

import { z } from "zod";
import type { LogLevel, MarkerPair, StreamConfig } from "../types/config";

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]) satisfies z.ZodType<LogLevel>;

export const MarkerPairSchema = z.object({
  open: z.string().min(1),
  close: z.string().min(1),
}) satisfies z.ZodType<MarkerPair>;

export const StreamConfigSchema = z.object({
  deadlineMs: z.number().int().positive(),
  waitTimeoutMs: z.number().int().positive(),
  joinTimeoutMs: z.number().int().nonnegative(),
  queueCapacity: z.number().int().positive(),
  lookahead: z.number().int().positive(),
  markers: MarkerPairSchema,
  maxDebugEvents: z.number().int().nonnegative(),
  debug: z.boolean(),
}) satisfies z.ZodType<StreamConfig>;
