// Zod schemas for agent event payloads

import { z } from "zod";

/**
 * Payload of a `current_tool_use` event
 */
export const ToolUsePayloadSchema = z
  .object({
    toolUseId: z.string().nullish(),
    tool_use_id: z.string().nullish(),
    name: z.string().nullish(),
    input: z.unknown().optional(),
  })
  .passthrough();

export type ToolUsePayload = z.infer<typeof ToolUsePayloadSchema>;

/**
 * Tool description inside a metrics entry
 */
export const MetricToolSchema = z
  .object({
    toolUseId: z.string().nullish(),
    tool_use_id: z.string().nullish(),
    name: z.string().nullish(),
    input: z.unknown().optional(),
    arguments: z.unknown().optional(),
  })
  .passthrough();

export const ToolMetricSchema = z
  .object({
    tool: MetricToolSchema,
  })
  .passthrough();

export const AgentMetricsSchema = z
  .object({
    tool_metrics: z
      .union([z.record(z.unknown()), z.array(z.unknown())])
      .nullish(),
    toolMetrics: z.union([z.record(z.unknown()), z.array(z.unknown())]).nullish(),
  })
  .passthrough();

/**
 * Value carried by a `result` event
 */
export const AgentResultSchema = z
  .object({
    message: z.unknown().optional(),
    metrics: AgentMetricsSchema.nullish(),
  })
  .passthrough();

export type AgentResultPayload = z.infer<typeof AgentResultSchema>;

export const MessageContentBlockSchema = z
  .object({
    text: z.string().nullish(),
  })
  .passthrough();

export const AgentMessageSchema = z
  .object({
    content: z.union([z.string(), z.array(z.unknown())]).nullish(),
  })
  .passthrough();
