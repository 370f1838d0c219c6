// Error types for the agent stream

/**
 * Error codes for stream errors
 */
export const StreamErrorCodes = {
  INVALID_CONFIG: "INVALID_CONFIG",
  SESSION_ACTIVE: "SESSION_ACTIVE",
  SESSION_NOT_STARTED: "SESSION_NOT_STARTED",
  EVENTS_CONSUMED: "EVENTS_CONSUMED",
} as const;

export type StreamErrorCode =
  (typeof StreamErrorCodes)[keyof typeof StreamErrorCodes];

/**
 * Reason attached to the synthetic stop event when the deadline passes
 */
export const TIMEOUT_REASON = "Timeout";

/**
 * Prefix of the final text of a force-stopped session
 */
export const STOP_TEXT_PREFIX = "Error: ";

/**
 * Reason recorded for a stop event that carries none
 */
export const UNKNOWN_STOP_REASON = "Unknown error";

export interface StreamErrorContext {
  code: StreamErrorCode;
  sessionId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Error raised by the public session API. Agent failures, timeouts and
 * handler failures are reported as data instead and never take this form.
 */
export class StreamError extends Error {
  readonly code: StreamErrorCode;
  readonly context: StreamErrorContext;
  readonly timestamp: number;

  constructor(message: string, context: StreamErrorContext) {
    super(message);
    this.name = "StreamError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, StreamError.prototype);
  }

  toDetailedString(): string {
    const parts = [this.message];
    if (this.context.sessionId) {
      parts.push(`session=${this.context.sessionId}`);
    }
    return parts.join(" | ");
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      sessionId: this.context.sessionId,
      metadata: this.context.metadata,
    };
  }
}

export function isStreamError(error: unknown): error is StreamError {
  return error instanceof StreamError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Name of any thrown value's type, e.g. "TypeError"
 */
export function errorTypeName(error: unknown): string {
  if (error instanceof Error) return error.name;
  if (error === null) return "null";
  return typeof error;
}
