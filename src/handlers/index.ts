// Built-in event handlers

import type { StreamConfig } from "../types/config";
import type { EventHandler } from "../types/events";
import type { SessionState } from "../types/session";
import type { Logger } from "../utils/logger";
import { DebugHandler } from "./debug";
import { LifecycleHandler } from "./lifecycle";
import { LoggingHandler } from "./logging";
import { ReasoningHandler } from "./reasoning";
import { TextHandler } from "./text";
import { ToolHandler } from "./tools";

export { DebugHandler, type DebugEntry } from "./debug";
export { LifecycleHandler } from "./lifecycle";
export { LoggingHandler } from "./logging";
export { ReasoningHandler } from "./reasoning";
export { TextHandler, type TextHandlerOptions } from "./text";
export { ToolHandler } from "./tools";

export interface DefaultHandlers {
  text: TextHandler;
  tools: ToolHandler;
  reasoning: ReasoningHandler;
  lifecycle: LifecycleHandler;
  logging: LoggingHandler;
  debug: DebugHandler;
}

/**
 * The standard handler set, bound to one session state
 */
export function createDefaultHandlers(
  state: SessionState,
  config: StreamConfig,
  logger?: Logger,
): DefaultHandlers {
  return {
    text: new TextHandler(state, {
      markers: config.markers,
      lookahead: config.lookahead,
    }),
    tools: new ToolHandler(state),
    reasoning: new ReasoningHandler(state),
    lifecycle: new LifecycleHandler(logger?.child({ component: "lifecycle" })),
    logging: new LoggingHandler(logger?.child({ component: "events" })),
    debug: new DebugHandler(config.debug, config.maxDebugEvents),
  };
}

export function handlerList(handlers: DefaultHandlers): EventHandler[] {
  return [
    handlers.text,
    handlers.tools,
    handlers.reasoning,
    handlers.lifecycle,
    handlers.logging,
    handlers.debug,
  ];
}
