// Lifecycle handler: records agent loop steps

import type {
  ClassifiedKind,
  EventHandler,
  HandlerOutcome,
} from "../types/events";
import { LIFECYCLE_KINDS } from "../types/events";
import { componentLogger, type Logger } from "../utils/logger";

export class LifecycleHandler implements EventHandler {
  readonly name = "lifecycle";
  readonly priority = 50;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger("lifecycle");
  }

  canHandle(kind: ClassifiedKind): boolean {
    return LIFECYCLE_KINDS.has(kind);
  }

  handle(_event: unknown, kind: ClassifiedKind): HandlerOutcome {
    this.logger.debug({ step: kind }, "lifecycle event");
    return { type: "lifecycle", handler: this.name, step: kind };
  }
}
