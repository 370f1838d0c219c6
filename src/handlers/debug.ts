// Debug handler: keeps the most recent events while enabled

import type {
  AgentEvent,
  ClassifiedKind,
  EventHandler,
} from "../types/events";

export interface DebugEntry {
  kind: ClassifiedKind;
  event: AgentEvent;
  ts: number;
}

export class DebugHandler implements EventHandler {
  readonly name = "debug";
  readonly priority = 95;
  private log: DebugEntry[] = [];

  constructor(
    private enabled: boolean = false,
    private readonly maxEvents: number = 100,
  ) {}

  canHandle(): boolean {
    return this.enabled;
  }

  handle(event: AgentEvent, kind: ClassifiedKind): undefined {
    this.log.push({ kind, event, ts: Date.now() });
    if (this.log.length > this.maxEvents) {
      this.log.splice(0, this.log.length - this.maxEvents);
    }
    return undefined;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getEventLog(): ReadonlyArray<DebugEntry> {
    return this.log;
  }

  clear(): void {
    this.log = [];
  }
}
