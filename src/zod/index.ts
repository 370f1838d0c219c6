// Zod schemas for configuration and event payloads

export {
  LogLevelSchema,
  MarkerPairSchema,
  StreamConfigSchema,
} from "./config";

export {
  ToolUsePayloadSchema,
  MetricToolSchema,
  ToolMetricSchema,
  AgentMetricsSchema,
  AgentResultSchema,
  MessageContentBlockSchema,
  AgentMessageSchema,
} from "./events";

export type { ToolUsePayload, AgentResultPayload } from "./events";
