/**
 * Tool ledger: maintains the ordered tool invocation entries of a session.
 *
 * Identity is the tool use id. Without an id, a result attaches to the most
 * recent entry, and a metrics backfill matches by name only against the most
 * recent entry that also has no id and no input yet.
 */

import type { SessionState, ToolInvocationEntry } from "../types/session";
import { ToolMetricSchema, ToolUsePayloadSchema } from "../zod/events";
import type { AgentResultPayload, ToolUsePayload } from "../zod/events";
import {
  isEmptyValue,
  isRecord,
  normalizeToolValue,
  pickToolUseId,
} from "../utils/normalize";

function addEntry(
  state: SessionState,
  entry: ToolInvocationEntry,
): ToolInvocationEntry {
  state.toolCalls.push(entry);
  if (entry.toolUseId) {
    state.toolsById.set(entry.toolUseId, entry);
  }
  return entry;
}

function defaultName(state: SessionState): string {
  return `Tool ${state.toolCalls.length + 1}`;
}

/**
 * Record a `current_tool_use` payload. Repeated sightings of the same id
 * reuse the entry; inputs arrive as growing partial JSON, so while the
 * entry is unfinished each non-empty input replaces the previous one.
 */
export function recordToolStart(
  state: SessionState,
  payload: unknown,
): ToolInvocationEntry {
  const parsed = ToolUsePayloadSchema.safeParse(payload);
  const data: ToolUsePayload = parsed.success ? parsed.data : {};
  const toolUseId = pickToolUseId(data);

  const existing = toolUseId ? state.toolsById.get(toolUseId) : undefined;
  if (existing) {
    if (existing.status === "pending" || existing.status === "running") {
      if (!isEmptyValue(data.input)) {
        setInput(existing, data.input);
      }
      existing.status = "running";
    }
    return existing;
  }

  const input = normalizeToolValue(data.input);
  return addEntry(state, {
    name: data.name || defaultName(state),
    toolUseId,
    input: input.value,
    inputIsStructured: input.structured,
    result: undefined,
    resultIsStructured: false,
    status: "running",
  });
}

/**
 * Record a `tool_result` payload. Objects may carry the id plus an
 * `output` or `content` field; anything else is the result itself.
 */
export function recordToolResult(
  state: SessionState,
  payload: unknown,
): ToolInvocationEntry {
  let toolUseId: string | undefined;
  let display: unknown = payload;

  if (isRecord(payload)) {
    const { toolUseId: camel, tool_use_id: snake, ...rest } = payload;
    toolUseId = pickToolUseId({
      toolUseId: typeof camel === "string" ? camel : undefined,
      tool_use_id: typeof snake === "string" ? snake : undefined,
    });
    if ("output" in rest) {
      display = rest.output;
    } else if ("content" in rest) {
      display = rest.content;
    } else if (Object.keys(rest).length > 0) {
      display = rest;
    }
  }

  let entry = toolUseId ? state.toolsById.get(toolUseId) : undefined;
  if (!entry && !toolUseId) {
    entry = state.toolCalls[state.toolCalls.length - 1];
  }
  if (!entry) {
    entry = addEntry(state, {
      name: "Tool",
      toolUseId,
      input: undefined,
      inputIsStructured: false,
      result: undefined,
      resultIsStructured: false,
      status: "running",
    });
  }

  const normalized = normalizeToolValue(display);
  entry.result = normalized.value ?? display;
  entry.resultIsStructured = normalized.structured;
  entry.status = "complete";
  return entry;
}

/**
 * Fill empty tool inputs from the metrics of a final agent result.
 * Populated inputs are never overwritten. Returns the number of entries updated.
 */
export function backfillToolInputs(
  state: SessionState,
  result: AgentResultPayload,
): number {
  const metrics = result.metrics;
  if (!metrics) return 0;

  const toolMetrics = metrics.tool_metrics ?? metrics.toolMetrics;
  if (!toolMetrics) return 0;

  const entries = Array.isArray(toolMetrics)
    ? toolMetrics
    : Object.values(toolMetrics);

  let updated = 0;
  for (const metric of entries) {
    const parsed = ToolMetricSchema.safeParse(metric);
    if (!parsed.success) continue;

    const { tool } = parsed.data;
    const rawInput = isEmptyValue(tool.input) ? tool.arguments : tool.input;
    if (rawInput === undefined || rawInput === null || rawInput === "") {
      continue;
    }

    const entry = findBackfillTarget(
      state,
      pickToolUseId(tool),
      tool.name ?? undefined,
    );
    if (entry && isEmptyValue(entry.input) && setInput(entry, rawInput)) {
      updated++;
    }
  }
  return updated;
}

/**
 * Mark every unfinished entry as failed
 */
export function markToolsStopped(state: SessionState): number {
  let marked = 0;
  for (const entry of state.toolCalls) {
    if (entry.status !== "complete") {
      entry.status = "error";
      marked++;
    }
  }
  return marked;
}

function findBackfillTarget(
  state: SessionState,
  toolUseId: string | undefined,
  name: string | undefined,
): ToolInvocationEntry | undefined {
  if (toolUseId) {
    const existing = state.toolsById.get(toolUseId);
    if (existing) return existing;
  } else if (name) {
    for (let i = state.toolCalls.length - 1; i >= 0; i--) {
      const entry = state.toolCalls[i];
      if (
        entry &&
        entry.name === name &&
        !entry.toolUseId &&
        isEmptyValue(entry.input)
      ) {
        return entry;
      }
    }
  } else {
    return undefined;
  }

  return addEntry(state, {
    name: name || defaultName(state),
    toolUseId,
    input: undefined,
    inputIsStructured: false,
    result: undefined,
    resultIsStructured: false,
    status: "pending",
  });
}

function setInput(entry: ToolInvocationEntry, rawInput: unknown): boolean {
  const normalized = normalizeToolValue(rawInput);
  if (normalized.value === undefined) return false;
  entry.input = normalized.value;
  entry.inputIsStructured = normalized.structured;
  return true;
}
