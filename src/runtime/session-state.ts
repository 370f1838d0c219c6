// Session state creation and reset

import type { SessionState } from "../types/session";
import { uuidv7 } from "../utils/uuid";

export function createSessionState(sessionId: string = uuidv7()): SessionState {
  return {
    sessionId,
    rawText: "",
    filteredText: "",
    hiddenText: undefined,
    reasoningText: "",
    finalResult: undefined,
    finalMessage: undefined,
    forceStopReason: undefined,
    toolCalls: [],
    toolsById: new Map(),
  };
}

/**
 * Reset in place; handlers keep their reference to the same object
 */
export function resetSessionState(
  state: SessionState,
  sessionId: string = uuidv7(),
): void {
  Object.assign(state, createSessionState(sessionId));
}
