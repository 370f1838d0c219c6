/**
 * Tests for StreamSession
 *
 * Covers the background agent call, the consumer iterator, the deadline,
 * and cleanup of abandoned calls.
 */

import { describe, it, expect } from "vitest";
import {
  StreamSession,
  forceStopEvent,
  terminalStatus,
} from "../src/runtime/session";
import { SessionStates, type SessionStatus } from "../src/runtime/state-machine";
import { StreamError, StreamErrorCodes } from "../src/utils/errors";
import { createLogger } from "../src/utils/logger";
import { sleep } from "../src/utils/timers";
import type { AgentEvent } from "../src/types/events";
import type { AgentInvoke } from "../src/types/session";

class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionError";
  }
}

// Small timings keep the timeout paths fast
const FAST = { waitTimeoutMs: 10, deadlineMs: 50, joinTimeoutMs: 20 };

async function collect<TInput, TResult>(
  session: StreamSession<TInput, TResult>,
): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of session.events()) {
    events.push(event);
  }
  return events;
}

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

describe("terminalStatus", () => {
  it("should map result and force_stop events", () => {
    expect(terminalStatus({ result: "x" })).toBe(SessionStates.COMPLETED);
    expect(terminalStatus({ result: undefined })).toBe(SessionStates.COMPLETED);
    expect(terminalStatus({ force_stop: true })).toBe(
      SessionStates.FORCE_STOPPED,
    );
  });

  it("should ignore other events", () => {
    expect(terminalStatus({ data: "x" })).toBeUndefined();
    expect(terminalStatus({ force_stop: false })).toBeUndefined();
    expect(terminalStatus({})).toBeUndefined();
  });
});

describe("forceStopEvent", () => {
  it("should build a frozen stop event", () => {
    const event = forceStopEvent("Timeout");
    expect(event).toEqual({ force_stop: true, force_stop_reason: "Timeout" });
    expect(Object.isFrozen(event)).toBe(true);
  });
});

describe("StreamSession", () => {
  describe("normal completion", () => {
    it("should yield callback events, then the result", async () => {
      const session = new StreamSession<string, string>(
        async (prompt, onEvent) => {
          onEvent({ data: "Hel" });
          onEvent({ data: "lo" });
          return `done: ${prompt}`;
        },
        FAST,
      );

      session.start("hi");
      const events = await collect(session);

      expect(events).toEqual([
        { data: "Hel" },
        { data: "lo" },
        { result: "done: hi" },
      ]);
      expect(session.status).toBe(SessionStates.DRAINED);
      expect(session.getHistory().map((t) => [t.from, t.to])).toEqual([
        ["idle", "running"],
        ["running", "completed"],
        ["completed", "drained"],
      ]);
    });

    it("should freeze a copy of each event", async () => {
      const payload: Record<string, unknown> = { data: "before" };
      const session = new StreamSession(async (_input: string, onEvent) => {
        onEvent(payload);
        payload.data = "after";
        return null;
      }, FAST);

      session.start("x");
      const [first] = await collect(session);

      expect(first).toEqual({ data: "before" });
      expect(Object.isFrozen(first)).toBe(true);
    });

    it("should not run the agent on the caller's stack", () => {
      let called = false;
      const session = new StreamSession(async () => {
        called = true;
        return "ok";
      }, FAST);

      session.start("x");

      expect(called).toBe(false);
      expect(session.status).toBe(SessionStates.RUNNING);
    });

    it("should notify status listeners", async () => {
      const statuses: SessionStatus[] = [];
      const session = new StreamSession(async () => "ok", FAST);
      session.onStatusChange((status) => statuses.push(status));

      session.start("x");
      await collect(session);

      expect(statuses).toEqual(["running", "completed", "drained"]);
    });
  });

  describe("agent failure", () => {
    it("should turn a rejection into one force-stop event", async () => {
      const session = new StreamSession(async () => {
        throw new ConnectionError("broken");
      }, FAST);

      session.start("x");
      const events = await collect(session);

      expect(events).toEqual([
        { force_stop: true, force_stop_reason: "broken" },
      ]);
      expect(session.getHistory().map((t) => t.to)).toEqual([
        "running",
        "force_stopped",
        "drained",
      ]);
    });

    it("should keep events emitted before the failure", async () => {
      const session = new StreamSession(async (_input: string, onEvent) => {
        onEvent({ data: "partial" });
        throw new ConnectionError("broken");
      }, FAST);

      session.start("x");

      expect(await collect(session)).toEqual([
        { data: "partial" },
        { force_stop: true, force_stop_reason: "broken" },
      ]);
    });

    it("should stop at the agent's own force-stop event", async () => {
      const session = new StreamSession(async (_input: string, onEvent) => {
        onEvent({ force_stop: true, force_stop_reason: "guardrail" });
        onEvent({ data: "ignored" });
        return "ok";
      }, FAST);

      session.start("x");

      expect(await collect(session)).toEqual([
        { force_stop: true, force_stop_reason: "guardrail" },
      ]);
    });
  });

  describe("deadline", () => {
    it("should synthesize a single Timeout stop", async () => {
      const session = new StreamSession<string, string>(() => never(), FAST);

      session.start("x");
      const events = await collect(session);

      expect(events).toEqual([
        { force_stop: true, force_stop_reason: "Timeout" },
      ]);
      expect(session.getHistory().map((t) => t.to)).toEqual([
        "running",
        "timed_out",
        "drained",
      ]);
    });

    it("should not time out while events keep arriving", async () => {
      const session = new StreamSession(
        async (_input: string, onEvent) => {
          for (let i = 0; i < 3; i++) {
            onEvent({ data: String(i) });
            await sleep(5);
          }
          return "ok";
        },
        { waitTimeoutMs: 50, deadlineMs: 1_000, joinTimeoutMs: 20 },
      );

      session.start("x");
      const events = await collect(session);

      expect(events.at(-1)).toEqual({ result: "ok" });
      expect(events).toHaveLength(4);
    });

    it("should discard events from an abandoned call", async () => {
      let lateEmit: ((event: AgentEvent) => void) | undefined;
      let calls = 0;
      const invoke: AgentInvoke<string, string> = (_input, onEvent) => {
        calls++;
        if (calls === 1) {
          lateEmit = onEvent;
          return never();
        }
        return Promise.resolve("second");
      };
      const session = new StreamSession(invoke, FAST);

      session.start("first");
      await collect(session);
      lateEmit?.({ data: "late" });

      session.start("second");
      expect(await collect(session)).toEqual([{ result: "second" }]);
    });
  });

  describe("silent finish", () => {
    class SilentSession extends StreamSession<string, string> {
      protected override async runAgent(
        _input: string,
        enqueue: (event: AgentEvent) => void,
      ): Promise<void> {
        enqueue({ data: "only" });
      }
    }

    it("should end when the call settles without a terminal event", async () => {
      const lines: Array<Record<string, unknown>> = [];
      const logger = createLogger("debug", {
        write(msg: string) {
          lines.push(JSON.parse(msg));
        },
      });
      const session = new SilentSession(async () => "unused", {
        ...FAST,
        logger,
      });

      session.start("x");

      expect(await collect(session)).toEqual([{ data: "only" }]);
      expect(session.getHistory().map((t) => t.to)).toEqual([
        "running",
        "completed",
        "drained",
      ]);
      expect(lines).toContainEqual(
        expect.objectContaining({
          level: 40,
          sessionId: session.sessionId,
          msg: "agent call finished without a terminal event",
        }),
      );
    });
  });

  describe("cleanup", () => {
    it("should drain when the consumer stops early", async () => {
      const session = new StreamSession(async (_input: string, onEvent) => {
        onEvent({ data: "first" });
        onEvent({ data: "second" });
        await sleep(5);
        return "ok";
      }, FAST);

      session.start("x");
      for await (const event of session.events()) {
        expect(event).toEqual({ data: "first" });
        break;
      }

      expect(session.status).toBe(SessionStates.DRAINED);
      expect(session.getHistory().map((t) => t.to)).toEqual([
        "running",
        "drained",
      ]);
    });
  });

  describe("API misuse", () => {
    it("should reject iteration before start", async () => {
      const session = new StreamSession(async () => "ok", FAST);

      await expect(session.events().next()).rejects.toMatchObject({
        code: StreamErrorCodes.SESSION_NOT_STARTED,
      });
    });

    it("should reject a second iteration of one session", async () => {
      const session = new StreamSession(async () => "ok", FAST);
      session.start("x");
      await collect(session);

      await expect(session.events().next()).rejects.toMatchObject({
        code: StreamErrorCodes.EVENTS_CONSUMED,
      });
    });

    it("should reject start while events are being consumed", async () => {
      const session = new StreamSession(async () => "ok", FAST);
      session.start("x");

      const iterator = session.events();
      const pending = iterator.next();

      expect(thrownBy(() => session.start("y"))).toMatchObject({
        code: StreamErrorCodes.SESSION_ACTIVE,
      });

      expect(await pending).toEqual({ value: { result: "ok" }, done: false });
      expect(await iterator.next()).toEqual({ value: undefined, done: true });
    });

    it("should reject invalid configuration", () => {
      const error = thrownBy(
        () => new StreamSession(async () => "ok", { deadlineMs: -1 }),
      );
      expect(error).toBeInstanceOf(StreamError);
      expect(error).toMatchObject({ code: StreamErrorCodes.INVALID_CONFIG });
    });
  });

  describe("restart", () => {
    it("should start a fresh session with a new id", async () => {
      const session = new StreamSession(
        async (input: string) => input.toUpperCase(),
        FAST,
      );

      session.start("a");
      const firstId = session.sessionId;
      expect(await collect(session)).toEqual([{ result: "A" }]);

      session.state.rawText = "stale";
      session.start("b");

      expect(session.sessionId).not.toBe(firstId);
      expect(session.state.rawText).toBe("");
      expect(await collect(session)).toEqual([{ result: "B" }]);
    });
  });
});
