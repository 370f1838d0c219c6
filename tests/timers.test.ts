import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Timer, settlesWithin, sleep } from "../src/utils/timers";

describe("Timer Utilities", () => {
  describe("sleep", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should resolve after the delay", async () => {
      let done = false;
      const pending = sleep(100).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(99);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    });
  });

  describe("settlesWithin", () => {
    it("should report a resolved promise", async () => {
      expect(await settlesWithin(Promise.resolve("ok"), 50)).toBe(true);
    });

    it("should report a rejected promise without rethrowing", async () => {
      expect(await settlesWithin(Promise.reject(new Error("x")), 50)).toBe(true);
    });

    it("should give up on a promise that never settles", async () => {
      const never = new Promise<void>(() => {});
      expect(await settlesWithin(never, 5)).toBe(false);
    });
  });

  describe("Timer", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("should report 0 before start", () => {
      const timer = new Timer();
      expect(timer.elapsed()).toBe(0);
      expect(timer.isRunning()).toBe(false);
    });

    it("should measure elapsed time while running", () => {
      const timer = new Timer();
      timer.start();
      vi.advanceTimersByTime(250);

      expect(timer.elapsed()).toBe(250);
      expect(timer.isRunning()).toBe(true);
    });

    it("should freeze elapsed time on stop", () => {
      const timer = new Timer();
      timer.start();
      vi.advanceTimersByTime(100);
      timer.stop();
      vi.advanceTimersByTime(500);

      expect(timer.elapsed()).toBe(100);
      expect(timer.isRunning()).toBe(false);
    });

    it("should restart from zero", () => {
      const timer = new Timer();
      timer.start();
      vi.advanceTimersByTime(100);
      timer.stop();

      timer.start();
      vi.advanceTimersByTime(30);
      expect(timer.elapsed()).toBe(30);

      timer.reset();
      expect(timer.elapsed()).toBe(0);
    });
  });
});
