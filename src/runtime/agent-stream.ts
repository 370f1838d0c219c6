/**
 * Agent Stream
 *
 * Wires a StreamSession, an EventDispatcher with the built-in handlers, and
 * a ResponseAssembler. Events are dispatched on the consumer side, one at a
 * time, in arrival order.
 *
 * @example
 * ```typescript
 * const agent = new AgentStream(async (prompt, onEvent) => {
 *   onEvent({ data: "Hello" });
 *   return { message: "Hello" };
 * });
 *
 * const message = await agent.run("hi", (progress) => render(progress.partial));
 * console.log(message.text);
 * ```
 */

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
} from "../types/events";
import type {
  AgentInvoke,
  AssembledMessage,
  PartialResponse,
} from "../types/session";
import {
  createDefaultHandlers,
  handlerList,
  type DefaultHandlers,
  type DebugEntry,
} from "../handlers";
import { ResponseAssembler } from "./assembler";
import { EventDispatcher, createEventDispatcher } from "./event-dispatcher";
import { StreamSession, type StreamSessionOptions } from "./session";
import type { SessionStatus } from "./state-machine";
import { getRootLogger } from "../utils/logger";

export interface AgentStreamOptions extends StreamSessionOptions {
  /** Extra handlers, registered after the built-in ones */
  handlers?: EventHandler[];
}

export interface StreamProgress {
  event: AgentEvent;
  kind: ClassifiedKind;
  outcomes: HandlerOutcome[];
  partial: PartialResponse;
}

export class AgentStream<TInput = string, TResult = unknown> {
  readonly session: StreamSession<TInput, TResult>;
  readonly dispatcher: EventDispatcher;
  readonly handlers: DefaultHandlers;
  private readonly assembler: ResponseAssembler;
  private ended = false;

  constructor(
    invoke: AgentInvoke<TInput, TResult>,
    options: AgentStreamOptions = {},
  ) {
    const { handlers = [], logger = getRootLogger(), ...sessionOptions } =
      options;

    this.session = new StreamSession(invoke, {
      ...sessionOptions,
      logger: logger.child({ component: "session" }),
    });
    this.handlers = createDefaultHandlers(
      this.session.state,
      this.session.config,
      logger,
    );
    this.dispatcher = createEventDispatcher(
      [...handlerList(this.handlers), ...handlers],
      { logger: logger.child({ component: "dispatcher" }) },
    );
    this.assembler = new ResponseAssembler(
      this.session.state,
      this.session.config.markers,
    );
  }

  /**
   * Start a session and yield progress after each dispatched event.
   * Call `finalize()` afterwards for the assembled message.
   */
  async *stream(input: TInput): AsyncGenerator<StreamProgress, void, undefined> {
    this.session.start(input);
    this.dispatcher.reset();
    this.assembler.reset();
    this.ended = false;

    for await (const event of this.session.events()) {
      const kind = this.dispatcher.classify(event);
      const outcomes = this.dispatcher.dispatch(event);
      this.assembler.consume(outcomes);
      yield { event, kind, outcomes, partial: this.assembler.snapshot() };
    }
  }

  /**
   * Run a session to completion and return the assembled message
   */
  async run(
    input: TInput,
    onProgress?: (progress: StreamProgress) => void,
  ): Promise<AssembledMessage> {
    for await (const progress of this.stream(input)) {
      onProgress?.(progress);
    }
    return this.finalize();
  }

  /**
   * Assemble the message for the current session. Flushes handler
   * buffers on the first call.
   */
  finalize(): AssembledMessage {
    if (!this.ended) {
      this.ended = true;
      this.assembler.consume(this.dispatcher.end());
    }
    return this.assembler.finalize();
  }

  /**
   * Live view of the current session
   */
  snapshot(): PartialResponse {
    return this.assembler.snapshot();
  }

  get status(): SessionStatus {
    return this.session.status;
  }

  setDebug(enabled: boolean): void {
    this.handlers.debug.setEnabled(enabled);
  }

  getDebugLog(): ReadonlyArray<DebugEntry> {
    return this.handlers.debug.getEventLog();
  }
}
