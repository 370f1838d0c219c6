/**
 * Logging handler: writes one structured log line per event.
 *
 * Text chunks log at debug, tool events at info, forced stops at error,
 * everything else at info.
 */

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
} from "../types/events";
import { EventKinds } from "../types/events";
import { isRecord } from "../utils/normalize";
import { componentLogger, type Logger } from "../utils/logger";

export class LoggingHandler implements EventHandler {
  readonly name = "logging";
  readonly priority = 80;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger("events");
  }

  canHandle(): boolean {
    return true;
  }

  handle(event: AgentEvent, kind: ClassifiedKind): undefined {
    const payload = event[kind];

    switch (kind) {
      case EventKinds.DATA:
      case EventKinds.DELTA:
        this.logger.debug(
          { kind, chars: String(payload).length },
          "stream chunk",
        );
        break;

      case EventKinds.CURRENT_TOOL_USE:
      case EventKinds.TOOL_RESULT: {
        const tool =
          isRecord(payload) && typeof payload.name === "string"
            ? payload.name
            : "unknown";
        this.logger.info({ kind, tool }, "tool event");
        break;
      }

      case EventKinds.FORCE_STOP:
        this.logger.error(
          { kind, reason: event.force_stop_reason ?? "unknown" },
          "forced stop",
        );
        break;

      default:
        this.logger.info({ kind }, "agent event");
    }
    return undefined;
  }
}
