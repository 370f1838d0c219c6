// Session status tracking: allowed transitions, history and listeners

import type { Logger } from "../utils/logger";

/**
 * Session state constants - use these instead of string literals
 */
export const SessionStates = {
  IDLE: "idle",
  RUNNING: "running",
  COMPLETED: "completed",
  FORCE_STOPPED: "force_stopped",
  TIMED_OUT: "timed_out",
  DRAINED: "drained",
} as const;

export type SessionStatus = (typeof SessionStates)[keyof typeof SessionStates];

export interface StateTransition {
  from: SessionStatus;
  to: SessionStatus;
  timestamp: number;
}

/**
 * Statuses reachable from each status. Leaving `drained` takes a reset.
 */
export const SESSION_TRANSITIONS: Readonly<
  Record<SessionStatus, readonly SessionStatus[]>
> = {
  idle: [SessionStates.RUNNING],
  running: [
    SessionStates.COMPLETED,
    SessionStates.FORCE_STOPPED,
    SessionStates.TIMED_OUT,
    SessionStates.DRAINED,
  ],
  completed: [SessionStates.DRAINED],
  force_stopped: [SessionStates.DRAINED],
  timed_out: [SessionStates.DRAINED],
  drained: [],
};

export class StateMachine {
  private state: SessionStatus = SessionStates.IDLE;
  private history: StateTransition[] = [];
  private readonly listeners = new Set<(state: SessionStatus) => void>();

  constructor(private readonly logger?: Logger) {}

  /**
   * Move to `next` if the current status allows it. Returns false (and
   * stays put) otherwise; moving to the current status is a no-op.
   */
  transition(next: SessionStatus): boolean {
    if (this.state === next) return true;
    if (!SESSION_TRANSITIONS[this.state].includes(next)) {
      this.logger?.debug(
        { from: this.state, to: next },
        "ignored session transition",
      );
      return false;
    }

    this.history.push({ from: this.state, to: next, timestamp: Date.now() });
    this.state = next;
    this.notify();
    return true;
  }

  get(): SessionStatus {
    return this.state;
  }

  reset(): void {
    this.state = SessionStates.IDLE;
    this.history = [];
  }

  getHistory(): ReadonlyArray<StateTransition> {
    return this.history;
  }

  /**
   * Subscribe to status changes; returns an unsubscribe function
   */
  subscribe(listener: (state: SessionStatus) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        this.logger?.warn(
          { err: error, status: this.state },
          "status listener failed",
        );
      }
    }
  }
}
