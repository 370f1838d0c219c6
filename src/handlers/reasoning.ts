// Reasoning handler: collects native reasoning text

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
} from "../types/events";
import { EventKinds, REASONING_KINDS } from "../types/events";
import type { SessionState } from "../types/session";

export class ReasoningHandler implements EventHandler {
  readonly name = "reasoning";
  readonly priority = 30;

  constructor(private readonly state: SessionState) {}

  canHandle(kind: ClassifiedKind): boolean {
    return REASONING_KINDS.has(kind);
  }

  handle(event: AgentEvent, kind: ClassifiedKind): HandlerOutcome {
    const text =
      kind === EventKinds.REASONING_TEXT
        ? event[EventKinds.REASONING_TEXT]
        : undefined;

    if (typeof text === "string" && text.length > 0) {
      this.state.reasoningText += text;
      return { type: "reasoning", handler: this.name, kind, text };
    }
    return { type: "reasoning", handler: this.name, kind };
  }
}
