/**
 * Agent Event Types
 *
 * Events arrive from the agent's callback as open-ended key/value payloads.
 * Exactly one kind is derivable per event; the kind is used for routing only.
 */

// ============================================================================
// Events
// ============================================================================

/**
 * Raw event as produced by the agent callback. Frozen once enqueued.
 */
export type AgentEvent = Readonly<Record<string, unknown>>;

/**
 * Well-known event keys, grouped by category.
 */
export const EventKinds = {
  // Text generation
  DATA: "data",
  DELTA: "delta",

  // Tools
  CURRENT_TOOL_USE: "current_tool_use",
  TOOL_RESULT: "tool_result",

  // Lifecycle
  INIT_EVENT_LOOP: "init_event_loop",
  START_EVENT_LOOP: "start_event_loop",
  START: "start",
  MESSAGE: "message",
  EVENT: "event",
  COMPLETE: "complete",

  // Terminal
  RESULT: "result",
  FORCE_STOP: "force_stop",

  // Reasoning
  REASONING: "reasoning",
  REASONING_TEXT: "reasoningText",
  REASONING_SIGNATURE: "reasoning_signature",
  REDACTED_CONTENT: "redactedContent",

  UNKNOWN: "unknown",
} as const;

export type EventKind = (typeof EventKinds)[keyof typeof EventKinds];

/**
 * Result of classifying an event. Events without a well-known key
 * classify as their first key, so arbitrary strings are possible.
 */
export type ClassifiedKind = EventKind | (string & {});

/**
 * Keys checked in order by the classifier before falling back to the first key.
 */
export const CLASSIFY_PRIORITY: readonly EventKind[] = [
  EventKinds.DATA,
  EventKinds.CURRENT_TOOL_USE,
  EventKinds.TOOL_RESULT,
  EventKinds.REASONING_TEXT,
  EventKinds.RESULT,
  EventKinds.FORCE_STOP,
];

export const LIFECYCLE_KINDS: ReadonlySet<string> = new Set<string>([
  EventKinds.INIT_EVENT_LOOP,
  EventKinds.START_EVENT_LOOP,
  EventKinds.START,
  EventKinds.MESSAGE,
  EventKinds.EVENT,
  EventKinds.COMPLETE,
]);

export const REASONING_KINDS: ReadonlySet<string> = new Set<string>([
  EventKinds.REASONING,
  EventKinds.REASONING_TEXT,
  EventKinds.REASONING_SIGNATURE,
  EventKinds.REDACTED_CONTENT,
]);

// ============================================================================
// Handlers
// ============================================================================

/**
 * A unit of event processing registered with the dispatcher.
 * Lower priority runs first.
 */
export interface EventHandler {
  readonly name: string;
  readonly priority: number;
  canHandle(kind: ClassifiedKind): boolean;
  handle(event: AgentEvent, kind: ClassifiedKind): HandlerOutcome | undefined;

  /** Called when a new session starts */
  reset?(): void;

  /** Called once after the last event of a session has been dispatched */
  end?(): HandlerOutcome | undefined;
}

// ============================================================================
// Handler Outcomes
// ============================================================================

interface OutcomeBase {
  /** Name of the handler that produced the outcome */
  handler: string;
}

export interface TextOutcome extends OutcomeBase {
  type: "text";
  /** Chunk as received */
  chunk: string;
  /** Portion of the chunk (plus buffered text) released as visible */
  visible: string;
}

export interface ResultOutcome extends OutcomeBase {
  type: "result";
  hasMessage: boolean;
}

export interface ForceStopOutcome extends OutcomeBase {
  type: "force_stop";
  reason: string;
}

export interface ToolOutcome extends OutcomeBase {
  type: "tool";
  action: "started" | "result" | "progress" | "stopped" | "backfill";
  toolUseId?: string;
  name?: string;
  /** Entries affected, for actions that touch several */
  count?: number;
}

export interface ReasoningOutcome extends OutcomeBase {
  type: "reasoning";
  kind: string;
  text?: string;
}

export interface LifecycleOutcome extends OutcomeBase {
  type: "lifecycle";
  step: string;
}

export interface HandlerErrorOutcome extends OutcomeBase {
  type: "handler_error";
  errorType: string;
  errorMessage: string;
  eventKind: string;
}

export type HandlerOutcome =
  | TextOutcome
  | ResultOutcome
  | ForceStopOutcome
  | ToolOutcome
  | ReasoningOutcome
  | LifecycleOutcome
  | HandlerErrorOutcome;
