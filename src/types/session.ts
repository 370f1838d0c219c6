// Session types for the agent stream

import type { AgentEvent, HandlerErrorOutcome } from "./events";

/**
 * The agent call: resolves with a result or rejects. While running it may
 * call `onEvent` any number of times.
 */
export type AgentInvoke<TInput = string, TResult = unknown> = (
  input: TInput,
  onEvent: (event: AgentEvent) => void,
) => Promise<TResult>;

export type ToolStatus = "pending" | "running" | "complete" | "error";

/**
 * Accumulated record of one tool call, observed across several events.
 */
export interface ToolInvocationEntry {
  name: string;
  toolUseId?: string;
  input?: unknown;
  inputIsStructured: boolean;
  result?: unknown;
  resultIsStructured: boolean;
  status: ToolStatus;
}

/**
 * Per-session mutable state. Owned by the StreamSession, written only by
 * dispatch handlers on the consumer side.
 */
export interface SessionState {
  sessionId: string;
  /** Every data chunk, concatenated */
  rawText: string;
  /** Data chunks with marker content removed */
  filteredText: string;
  /** Interior of the last resolved marker pair */
  hiddenText?: string;
  /** Text from native reasoning events */
  reasoningText: string;
  /** The value the agent call resolved with */
  finalResult?: unknown;
  /** Message extracted from the final result */
  finalMessage?: unknown;
  /** Set when the agent failed or timed out */
  forceStopReason?: string;
  toolCalls: ToolInvocationEntry[];
  toolsById: Map<string, ToolInvocationEntry>;
}

/**
 * Final structured message for one session.
 */
export interface AssembledMessage {
  sessionId: string;
  text: string;
  hiddenText?: string;
  reasoningText?: string;
  toolCalls: ToolInvocationEntry[];
  forceStopped: boolean;
  handlerErrors: HandlerErrorOutcome[];
}

/**
 * Live view of a session, available before finalize.
 */
export interface PartialResponse {
  sessionId: string;
  text: string;
  reasoningText: string;
  toolCalls: ToolInvocationEntry[];
  forceStopReason?: string;
  handlerErrors: HandlerErrorOutcome[];
}
