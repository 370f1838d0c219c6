/**
 * Stream Session
 *
 * Runs one agent call in the background and hands its callback events to
 * the consumer through a queue. The consumer iterates `events()`, which
 * waits up to `waitTimeoutMs` per event and synthesizes a "Timeout" stop
 * once `deadlineMs` passes without a terminal event.
 *
 * The agent call cannot be interrupted. On timeout it is abandoned, not
 * killed: cleanup waits up to `joinTimeoutMs` for it to settle, then stops
 * accepting its events. Anything it produces later is discarded.
 */

import type { StreamConfig, StreamOptions } from "../types/config";
import type { AgentEvent } from "../types/events";
import { EventKinds } from "../types/events";
import type { AgentInvoke, SessionState } from "../types/session";
import { resolveConfig } from "./config";
import { EventQueue } from "./event-queue";
import { createSessionState, resetSessionState } from "./session-state";
import {
  SessionStates,
  StateMachine,
  type SessionStatus,
  type StateTransition,
} from "./state-machine";
import {
  StreamError,
  StreamErrorCodes,
  TIMEOUT_REASON,
  errorMessage,
} from "../utils/errors";
import { componentLogger, type Logger } from "../utils/logger";
import { Timer, settlesWithin } from "../utils/timers";

export interface StreamSessionOptions extends StreamOptions {
  logger?: Logger;
}

interface SessionTask {
  generation: number;
  settled: boolean;
  accepting: boolean;
  done: Promise<void>;
}

/**
 * Build a forced-stop event
 */
export function forceStopEvent(reason: string): AgentEvent {
  return Object.freeze({ force_stop: true, force_stop_reason: reason });
}

/**
 * Session status a terminal event leads to, or undefined for other events
 */
export function terminalStatus(event: AgentEvent): SessionStatus | undefined {
  if (event[EventKinds.FORCE_STOP] === true) return SessionStates.FORCE_STOPPED;
  if (EventKinds.RESULT in event) return SessionStates.COMPLETED;
  return undefined;
}

export class StreamSession<TInput = string, TResult = unknown> {
  readonly config: StreamConfig;
  readonly state: SessionState;
  private readonly invoke: AgentInvoke<TInput, TResult>;
  private readonly queue: EventQueue<AgentEvent>;
  private readonly machine: StateMachine;
  private readonly timer = new Timer();
  private readonly logger: Logger;
  private generation = 0;
  private task: SessionTask | null = null;
  private consumed = false;
  private iterating = false;

  constructor(
    invoke: AgentInvoke<TInput, TResult>,
    options: StreamSessionOptions = {},
  ) {
    const { logger, ...streamOptions } = options;
    this.invoke = invoke;
    this.config = resolveConfig(streamOptions);
    this.logger = logger ?? componentLogger("session");
    this.machine = new StateMachine(this.logger);
    this.state = createSessionState();
    this.queue = new EventQueue<AgentEvent>({
      capacity: this.config.queueCapacity,
      onHighWater: (size) =>
        this.logger.warn(
          { sessionId: this.state.sessionId, size },
          "event queue above capacity",
        ),
    });
  }

  /**
   * Reset state and launch the agent call in the background
   * @throws StreamError SESSION_ACTIVE while a previous session is being iterated
   */
  start(input: TInput): void {
    if (this.iterating) {
      throw new StreamError("Cannot start while events are being consumed", {
        code: StreamErrorCodes.SESSION_ACTIVE,
        sessionId: this.state.sessionId,
      });
    }

    if (this.task) {
      this.task.accepting = false;
    }
    const stale = this.queue.drain();
    if (stale.length > 0) {
      this.logger.debug({ count: stale.length }, "discarded stale events");
    }

    resetSessionState(this.state);
    this.machine.reset();
    this.machine.transition(SessionStates.RUNNING);
    this.consumed = false;
    this.timer.start();
    this.task = this.launch(input, ++this.generation);

    this.logger.debug({ sessionId: this.state.sessionId }, "session started");
  }

  /**
   * Events in arrival order, ending after a terminal event, a timeout,
   * or the agent call finishing silently. Single pass per `start`.
   */
  async *events(): AsyncGenerator<AgentEvent, void, undefined> {
    const task = this.task;
    if (!task) {
      throw new StreamError("Session has not been started", {
        code: StreamErrorCodes.SESSION_NOT_STARTED,
      });
    }
    if (this.consumed) {
      throw new StreamError("Session events were already consumed", {
        code: StreamErrorCodes.EVENTS_CONSUMED,
        sessionId: this.state.sessionId,
      });
    }
    this.consumed = true;
    this.iterating = true;

    try {
      for (;;) {
        const event = await this.queue.take(this.config.waitTimeoutMs);

        if (event !== undefined) {
          const terminal = terminalStatus(event);
          if (terminal) this.machine.transition(terminal);
          yield event;
          if (terminal) return;
          continue;
        }

        // runAgent posts a terminal event before settling; a subclass that
        // overrides it may not
        if (task.settled) {
          this.logger.warn(
            { sessionId: this.state.sessionId },
            "agent call finished without a terminal event",
          );
          this.machine.transition(SessionStates.COMPLETED);
          return;
        }

        if (this.timer.elapsed() > this.config.deadlineMs) {
          this.logger.warn(
            {
              sessionId: this.state.sessionId,
              deadlineMs: this.config.deadlineMs,
            },
            "session deadline exceeded",
          );
          this.machine.transition(SessionStates.TIMED_OUT);
          yield forceStopEvent(TIMEOUT_REASON);
          return;
        }
      }
    } finally {
      this.iterating = false;
      await this.cleanup(task);
    }
  }

  get status(): SessionStatus {
    return this.machine.get();
  }

  get sessionId(): string {
    return this.state.sessionId;
  }

  /**
   * Milliseconds since `start`
   */
  elapsed(): number {
    return this.timer.elapsed();
  }

  getHistory(): ReadonlyArray<StateTransition> {
    return this.machine.getHistory();
  }

  onStatusChange(listener: (status: SessionStatus) => void): () => void {
    return this.machine.subscribe(listener);
  }

  private launch(input: TInput, generation: number): SessionTask {
    const task: SessionTask = {
      generation,
      settled: false,
      accepting: true,
      done: Promise.resolve(),
    };

    const enqueue = (event: AgentEvent): void => {
      if (!task.accepting) {
        this.logger.debug({ generation }, "discarded late event");
        return;
      }
      this.queue.push(Object.freeze({ ...event }));
    };

    task.done = this.runAgent(input, enqueue).finally(() => {
      task.settled = true;
    });
    return task;
  }

  /**
   * Run the agent call and post its terminal event: `{ result }` on success,
   * a force-stop on failure. Never rejects.
   */
  protected async runAgent(
    input: TInput,
    enqueue: (event: AgentEvent) => void,
  ): Promise<void> {
    // Yield first so the agent never runs on the caller's stack
    await Promise.resolve();
    try {
      const result = await this.invoke(input, enqueue);
      enqueue({ [EventKinds.RESULT]: result });
    } catch (error) {
      this.logger.error({ err: error }, "agent call failed");
      enqueue(forceStopEvent(errorMessage(error)));
    }
  }

  private async cleanup(task: SessionTask): Promise<void> {
    if (!task.settled) {
      const joined = await settlesWithin(task.done, this.config.joinTimeoutMs);
      if (!joined) {
        this.logger.warn(
          {
            sessionId: this.state.sessionId,
            joinTimeoutMs: this.config.joinTimeoutMs,
          },
          "agent call still running, abandoning it",
        );
      }
    }

    task.accepting = false;
    const discarded = this.queue.drain();
    if (discarded.length > 0) {
      this.logger.debug({ count: discarded.length }, "drained queued events");
    }
    this.timer.stop();
    this.machine.transition(SessionStates.DRAINED);
  }
}
