/**
 * Response Assembler
 *
 * Folds the outcome lists of one session into the final message.
 * Live text and stop reason come from outcomes; tool entries, hidden text
 * and the agent's own result are read from the session state.
 */

import type { MarkerPair } from "../types/config";
import type { HandlerErrorOutcome, HandlerOutcome } from "../types/events";
import type {
  AssembledMessage,
  PartialResponse,
  SessionState,
  ToolInvocationEntry,
} from "../types/session";
import { splitMarkedText } from "./marker-splitter";
import { STOP_TEXT_PREFIX } from "../utils/errors";
import { extractMessageText } from "../utils/normalize";

export class ResponseAssembler {
  private visibleText = "";
  private stopReason: string | undefined;
  private handlerErrors: HandlerErrorOutcome[] = [];

  constructor(
    private readonly state: SessionState,
    private readonly markers: MarkerPair,
  ) {}

  consume(outcomes: readonly HandlerOutcome[]): void {
    for (const outcome of outcomes) {
      switch (outcome.type) {
        case "text":
          this.visibleText += outcome.visible;
          break;
        case "force_stop":
          this.stopReason = outcome.reason;
          break;
        case "handler_error":
          this.handlerErrors.push(outcome);
          break;
        default:
          break;
      }
    }
  }

  /**
   * Current progress, for rendering before the session ends
   */
  snapshot(): PartialResponse {
    return {
      sessionId: this.state.sessionId,
      text: this.visibleText,
      reasoningText: this.state.reasoningText,
      toolCalls: this.state.toolCalls.map((entry) => ({ ...entry })),
      forceStopReason: this.stopReason,
      handlerErrors: [...this.handlerErrors],
    };
  }

  /**
   * Build the final message. A forced stop replaces the text with the
   * stop reason and suppresses hidden text.
   */
  finalize(): AssembledMessage {
    const toolCalls = this.state.toolCalls.map(finalizeEntry);
    const base = {
      sessionId: this.state.sessionId,
      toolCalls,
      handlerErrors: [...this.handlerErrors],
    };

    if (this.stopReason !== undefined) {
      return {
        ...base,
        text: `${STOP_TEXT_PREFIX}${this.stopReason}`,
        forceStopped: true,
      };
    }

    const raw =
      this.state.rawText || extractMessageText(this.state.finalMessage);
    const split = splitMarkedText(raw, this.markers);
    const hidden = (this.state.hiddenText ?? split.hidden)?.trim();

    return {
      ...base,
      text: split.visible.trim(),
      hiddenText: hidden || undefined,
      reasoningText: this.state.reasoningText || undefined,
      forceStopped: false,
    };
  }

  reset(): void {
    this.visibleText = "";
    this.stopReason = undefined;
    this.handlerErrors = [];
  }
}

// Entries still running when the session completes are considered done
function finalizeEntry(entry: ToolInvocationEntry): ToolInvocationEntry {
  return {
    ...entry,
    status: entry.status === "running" ? "complete" : entry.status,
  };
}
