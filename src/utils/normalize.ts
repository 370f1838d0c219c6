// Payload normalization utilities for tool calls and agent messages

import {
  AgentMessageSchema,
  MessageContentBlockSchema,
} from "../zod/events";

export interface NormalizedValue {
  value: unknown;
  /** True when the value is an object/array, or a string that parsed as JSON */
  structured: boolean;
}

/**
 * Plain object check (arrays excluded)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a tool input or result for display.
 * Strings that look like JSON objects or arrays are parsed.
 */
export function normalizeToolValue(value: unknown): NormalizedValue {
  if (value === null || value === undefined) {
    return { value: undefined, structured: false };
  }
  if (typeof value === "object") {
    return { value, structured: true };
  }
  if (typeof value === "string") {
    const candidate = value.trim();
    if (candidate.startsWith("{") || candidate.startsWith("[")) {
      try {
        const parsed: unknown = JSON.parse(value);
        return { value: parsed, structured: true };
      } catch {
        // Not JSON after all, keep the raw string
      }
    }
    return { value, structured: false };
  }
  return { value, structured: false };
}

/**
 * True for undefined, null, blank strings, and empty arrays/objects
 */
export function isEmptyValue(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === "string") return value.trim().length === 0;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Tool use id from either the camelCase or snake_case field
 */
export function pickToolUseId(payload: {
  toolUseId?: string | null;
  tool_use_id?: string | null;
}): string | undefined {
  return payload.toolUseId || payload.tool_use_id || undefined;
}

/**
 * Plain text of an agent message: the string itself, a string `content`,
 * or the first non-empty `text` block of a `content` array.
 */
export function extractMessageText(message: unknown): string {
  if (!message) return "";
  if (typeof message === "string") return message;

  const parsed = AgentMessageSchema.safeParse(message);
  if (!parsed.success) return "";

  const { content } = parsed.data;
  if (typeof content === "string") return content;
  if (Array.isArray(content)) {
    for (const item of content) {
      const block = MessageContentBlockSchema.safeParse(item);
      if (block.success && block.data.text) {
        return block.data.text;
      }
    }
  }
  return "";
}
