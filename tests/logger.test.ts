import { describe, it, expect } from "vitest";
import {
  componentLogger,
  createLogger,
  logLevelFromEnv,
} from "../src/utils/logger";

function capture(level: Parameters<typeof createLogger>[0]) {
  const lines: unknown[] = [];
  const logger = createLogger(level, {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  });
  return { logger, lines };
}

describe("createLogger", () => {
  it("should write named JSON lines", () => {
    const { logger, lines } = capture("info");

    logger.info({ sessionId: "s1" }, "session started");

    expect(lines).toEqual([
      expect.objectContaining({
        level: 30,
        name: "agent-stream",
        sessionId: "s1",
        msg: "session started",
      }),
    ]);
  });

  it("should respect the level", () => {
    const { logger, lines } = capture("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(lines).toEqual([expect.objectContaining({ msg: "shown" })]);
  });
});

describe("componentLogger", () => {
  it("should bind the component name", () => {
    const { logger, lines } = capture("info");

    componentLogger("session", logger).info("ready");

    expect(lines).toEqual([
      expect.objectContaining({ component: "session", msg: "ready" }),
    ]);
  });
});

describe("logLevelFromEnv", () => {
  it("should read a valid level", () => {
    expect(logLevelFromEnv({ AGENT_STREAM_LOG_LEVEL: "debug" })).toBe("debug");
  });

  it("should default to info", () => {
    expect(logLevelFromEnv({})).toBe("info");
    expect(logLevelFromEnv({ AGENT_STREAM_LOG_LEVEL: "loud" })).toBe("info");
  });
});
