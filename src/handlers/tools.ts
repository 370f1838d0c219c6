// Tool handler: tracks tool invocations and their status

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
} from "../types/events";
import { EventKinds } from "../types/events";
import type { SessionState } from "../types/session";
import {
  backfillToolInputs,
  markToolsStopped,
  recordToolResult,
  recordToolStart,
} from "../runtime/tool-ledger";
import { AgentResultSchema } from "../zod/events";

const TOOL_KINDS: ReadonlySet<string> = new Set<string>([
  EventKinds.CURRENT_TOOL_USE,
  EventKinds.TOOL_RESULT,
  EventKinds.EVENT,
  EventKinds.RESULT,
  EventKinds.FORCE_STOP,
]);

export class ToolHandler implements EventHandler {
  readonly name = "tools";
  readonly priority = 20;

  constructor(private readonly state: SessionState) {}

  canHandle(kind: ClassifiedKind): boolean {
    return TOOL_KINDS.has(kind);
  }

  handle(event: AgentEvent, kind: ClassifiedKind): HandlerOutcome | undefined {
    switch (kind) {
      case EventKinds.CURRENT_TOOL_USE: {
        const entry = recordToolStart(this.state, event[kind]);
        return {
          type: "tool",
          handler: this.name,
          action: "started",
          toolUseId: entry.toolUseId,
          name: entry.name,
        };
      }

      case EventKinds.TOOL_RESULT: {
        const entry = recordToolResult(this.state, event[kind]);
        return {
          type: "tool",
          handler: this.name,
          action: "result",
          toolUseId: entry.toolUseId,
          name: entry.name,
        };
      }

      case EventKinds.EVENT: {
        const running = this.state.toolCalls.filter(
          (entry) => entry.status === "running",
        ).length;
        if (running === 0) return undefined;
        return {
          type: "tool",
          handler: this.name,
          action: "progress",
          count: running,
        };
      }

      case EventKinds.RESULT: {
        const parsed = AgentResultSchema.safeParse(event[kind]);
        if (!parsed.success) return undefined;
        const count = backfillToolInputs(this.state, parsed.data);
        if (count === 0) return undefined;
        return { type: "tool", handler: this.name, action: "backfill", count };
      }

      case EventKinds.FORCE_STOP: {
        if (event[kind] !== true) return undefined;
        const count = markToolsStopped(this.state);
        if (count === 0) return undefined;
        return { type: "tool", handler: this.name, action: "stopped", count };
      }

      default:
        return undefined;
    }
  }
}
