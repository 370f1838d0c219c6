// Agent event streaming: background agent calls, priority-ordered event
// handlers, and hidden-reasoning extraction from chunked text.
// Main entry point

// Runner
export { AgentStream } from "./runtime/agent-stream";
export type { AgentStreamOptions, StreamProgress } from "./runtime/agent-stream";

// Session
export {
  StreamSession,
  forceStopEvent,
  terminalStatus,
} from "./runtime/session";
export type { StreamSessionOptions } from "./runtime/session";
export {
  SESSION_TRANSITIONS,
  SessionStates,
  StateMachine,
} from "./runtime/state-machine";
export type { SessionStatus, StateTransition } from "./runtime/state-machine";
export { EventQueue } from "./runtime/event-queue";
export type { EventQueueOptions } from "./runtime/event-queue";
export { createSessionState, resetSessionState } from "./runtime/session-state";

// Dispatch
export {
  EventDispatcher,
  createEventDispatcher,
  classifyEvent,
} from "./runtime/event-dispatcher";
export type { EventDispatcherConfig } from "./runtime/event-dispatcher";

// Marker splitting
export { MarkerSplitter, splitMarkedText } from "./runtime/marker-splitter";
export type {
  MarkerSplitterOptions,
  SplitterMode,
  SplitText,
} from "./runtime/marker-splitter";

// Assembly
export { ResponseAssembler } from "./runtime/assembler";
export {
  recordToolStart,
  recordToolResult,
  backfillToolInputs,
  markToolsStopped,
} from "./runtime/tool-ledger";

// Handlers
export {
  TextHandler,
  ToolHandler,
  ReasoningHandler,
  LifecycleHandler,
  LoggingHandler,
  DebugHandler,
  createDefaultHandlers,
  handlerList,
} from "./handlers";
export type {
  DefaultHandlers,
  DebugEntry,
  TextHandlerOptions,
} from "./handlers";

// Configuration
export { STREAM_DEFAULTS, resolveConfig, optionsFromEnv } from "./runtime/config";

// Errors
export {
  StreamError,
  StreamErrorCodes,
  STOP_TEXT_PREFIX,
  TIMEOUT_REASON,
  UNKNOWN_STOP_REASON,
  isStreamError,
} from "./utils/errors";
export type { StreamErrorCode, StreamErrorContext } from "./utils/errors";

// Logging
export {
  createLogger,
  getRootLogger,
  setRootLogger,
  componentLogger,
  logLevelFromEnv,
} from "./utils/logger";
export type { Logger } from "./utils/logger";

// Utilities
export {
  normalizeToolValue,
  extractMessageText,
} from "./utils/normalize";
export type { NormalizedValue } from "./utils/normalize";

// Schemas
export * from "./zod";

// Types
export * from "./types";
