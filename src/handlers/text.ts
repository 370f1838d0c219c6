/**
 * Text handler: accumulates streamed text, runs the marker splitter on
 * every chunk, and records the final result and forced stops.
 */

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
} from "../types/events";
import { EventKinds } from "../types/events";
import type { MarkerPair } from "../types/config";
import type { SessionState } from "../types/session";
import { MarkerSplitter } from "../runtime/marker-splitter";
import { UNKNOWN_STOP_REASON } from "../utils/errors";
import { AgentResultSchema } from "../zod/events";

export interface TextHandlerOptions {
  markers: MarkerPair;
  lookahead: number;
}

export class TextHandler implements EventHandler {
  readonly name = "text";
  readonly priority = 10;
  private readonly splitter: MarkerSplitter;

  constructor(
    private readonly state: SessionState,
    options: TextHandlerOptions,
  ) {
    this.splitter = new MarkerSplitter({
      ...options.markers,
      lookahead: options.lookahead,
    });
  }

  canHandle(kind: ClassifiedKind): boolean {
    return (
      kind === EventKinds.DATA ||
      kind === EventKinds.RESULT ||
      kind === EventKinds.FORCE_STOP
    );
  }

  handle(event: AgentEvent, kind: ClassifiedKind): HandlerOutcome | undefined {
    switch (kind) {
      case EventKinds.DATA:
        return this.handleData(event[EventKinds.DATA]);
      case EventKinds.RESULT:
        return this.handleResult(event[EventKinds.RESULT]);
      case EventKinds.FORCE_STOP:
        return this.handleForceStop(event);
      default:
        return undefined;
    }
  }

  reset(): void {
    this.splitter.reset();
  }

  /**
   * Release text the splitter still holds for marker detection
   */
  end(): HandlerOutcome | undefined {
    const visible = this.splitter.end();
    this.syncHidden();
    if (!visible) return undefined;
    this.state.filteredText += visible;
    return { type: "text", handler: this.name, chunk: "", visible };
  }

  private handleData(chunk: unknown): HandlerOutcome | undefined {
    if (typeof chunk !== "string" || chunk.length === 0) return undefined;

    this.state.rawText += chunk;
    const visible = this.splitter.feed(chunk);
    this.state.filteredText += visible;
    this.syncHidden();

    return { type: "text", handler: this.name, chunk, visible };
  }

  private handleResult(result: unknown): HandlerOutcome {
    this.state.finalResult = result;
    const parsed = AgentResultSchema.safeParse(result);
    const message = parsed.success ? parsed.data.message : undefined;
    if (message !== undefined && message !== null) {
      this.state.finalMessage = message;
    }
    return {
      type: "result",
      handler: this.name,
      hasMessage: this.state.finalMessage !== undefined,
    };
  }

  private handleForceStop(event: AgentEvent): HandlerOutcome | undefined {
    if (event[EventKinds.FORCE_STOP] !== true) return undefined;
    const reason = event.force_stop_reason;
    this.state.forceStopReason =
      typeof reason === "string" && reason ? reason : UNKNOWN_STOP_REASON;
    return {
      type: "force_stop",
      handler: this.name,
      reason: this.state.forceStopReason,
    };
  }

  private syncHidden(): void {
    const hidden = this.splitter.hiddenText;
    if (hidden !== undefined) {
      this.state.hiddenText = hidden;
    }
  }
}
