/**
 * Event Dispatcher
 *
 * Priority-ordered routing of agent events to handlers.
 * - Handlers are kept sorted by priority (ascending, stable)
 * - Each event is classified once, then offered to every handler that accepts its kind
 * - Handler failures become `handler_error` outcomes; dispatch never throws
 */

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
  HandlerErrorOutcome,
} from "../types/events";
import { CLASSIFY_PRIORITY, EventKinds } from "../types/events";
import { errorMessage, errorTypeName } from "../utils/errors";
import { componentLogger, type Logger } from "../utils/logger";

export interface EventDispatcherConfig {
  logger?: Logger;
}

interface Registration {
  handler: EventHandler;
  priority: number;
  seq: number;
}

/**
 * Derive the kind of an event: the first well-known key present, else
 * the event's first key, else "unknown".
 */
export function classifyEvent(event: AgentEvent): ClassifiedKind {
  for (const key of CLASSIFY_PRIORITY) {
    if (key in event) return key;
  }
  const keys = Object.keys(event);
  return keys[0] ?? EventKinds.UNKNOWN;
}

export class EventDispatcher {
  private registrations: Registration[] = [];
  private nextSeq = 0;
  private readonly logger: Logger;

  constructor(config: EventDispatcherConfig = {}) {
    this.logger = config.logger ?? componentLogger("dispatcher");
  }

  /**
   * Register a handler. Priority defaults to the handler's own.
   */
  register(handler: EventHandler, priority: number = handler.priority): void {
    this.registrations.push({ handler, priority, seq: this.nextSeq++ });
    // Array.prototype.sort is stable; seq keeps ties in registration order regardless
    this.registrations.sort((a, b) => a.priority - b.priority || a.seq - b.seq);
  }

  /**
   * Remove a handler
   */
  unregister(handler: EventHandler): boolean {
    const index = this.registrations.findIndex((r) => r.handler === handler);
    if (index === -1) return false;
    this.registrations.splice(index, 1);
    return true;
  }

  classify(event: AgentEvent): ClassifiedKind {
    return classifyEvent(event);
  }

  /**
   * Handlers in dispatch order
   */
  getHandlers(): EventHandler[] {
    return this.registrations.map((r) => r.handler);
  }

  /**
   * Handlers that accept the given kind, in dispatch order
   */
  handlersFor(kind: ClassifiedKind): EventHandler[] {
    return this.getHandlers().filter((handler) => handler.canHandle(kind));
  }

  /**
   * Dispatch an event to every interested handler, collecting outcomes
   */
  dispatch(event: AgentEvent): HandlerOutcome[] {
    const kind = this.classify(event);
    const outcomes: HandlerOutcome[] = [];

    // Snapshot registrations so handlers can't disturb this dispatch
    for (const { handler } of [...this.registrations]) {
      const outcome = this.invoke(handler, kind, () => {
        if (!handler.canHandle(kind)) return undefined;
        return handler.handle(event, kind);
      });
      if (outcome) outcomes.push(outcome);
    }

    return outcomes;
  }

  /**
   * Reset every handler for a new session
   */
  reset(): void {
    for (const { handler } of this.registrations) {
      if (!handler.reset) continue;
      try {
        handler.reset();
      } catch (error) {
        this.logger.warn(
          { handler: handler.name, err: error },
          "handler reset failed",
        );
      }
    }
  }

  /**
   * Signal end of session to every handler
   */
  end(): HandlerOutcome[] {
    const outcomes: HandlerOutcome[] = [];
    for (const { handler } of [...this.registrations]) {
      const outcome = this.invoke(handler, "end", () => handler.end?.());
      if (outcome) outcomes.push(outcome);
    }
    return outcomes;
  }

  getHandlerCount(): number {
    return this.registrations.length;
  }

  private invoke(
    handler: EventHandler,
    kind: ClassifiedKind,
    call: () => HandlerOutcome | undefined,
  ): HandlerOutcome | undefined {
    try {
      return call();
    } catch (error) {
      const outcome: HandlerErrorOutcome = {
        type: "handler_error",
        handler: handler.name,
        errorType: errorTypeName(error),
        errorMessage: errorMessage(error),
        eventKind: kind,
      };
      this.logger.warn(
        { handler: handler.name, eventKind: kind, err: error },
        "event handler failed",
      );
      return outcome;
    }
  }
}

/**
 * Create a dispatcher with the given handlers registered
 */
export function createEventDispatcher(
  handlers: EventHandler[] = [],
  config: EventDispatcherConfig = {},
): EventDispatcher {
  const dispatcher = new EventDispatcher(config);
  for (const handler of handlers) {
    dispatcher.register(handler);
  }
  return dispatcher;
}
