import type { EventSink } from "#/core";
import type { EngineError } from "#/errors";
import { formatRepoRef } from "#/packageRef";
import { publishKey } from "#/publish";
import type {
  OutcomeFailure,
  OutcomeItem,
  SyncCommand,
  SyncOutcome,
  SyncState,
  SyncStatus,
} from "./sync.types";

export function describeItem(item: OutcomeItem): string {
  return item.type === "package" ? formatRepoRef(item.ref) : publishKey(item.target);
}

/**
 * Accumulates one command's outcome and reports every step to the sink.
 */
export class OutcomeBuilder {
  private readonly succeeded: OutcomeItem[] = [];
  private readonly failed: OutcomeFailure[] = [];
  private mutations = 0;
  private readonly command: SyncCommand;
  private readonly events: EventSink;
  private readonly dryRun: boolean;

  /**
   * In a dry run, succeeded items are the planned ones.
   */
  constructor(command: SyncCommand, events: EventSink, dryRun = false) {
    this.command = command;
    this.events = events;
    this.dryRun = dryRun;
  }

  get mutationCount(): number {
    return this.mutations;
  }

  enter(state: SyncState): void {
    this.events.emit({
      level: "debug",
      type: "state",
      message: `${this.command}: ${state}`,
      data: { command: this.command, state },
    });
  }

  succeed(item: OutcomeItem): void {
    this.succeeded.push(item);
    if (item.type === "package") {
      this.mutations += 1;
    }
    const label = describeItem(item);
    this.events.emit({
      level: "info",
      type: "item-succeeded",
      message: `${label} ${this.dryRun ? "would be " : ""}${item.type === "package" ? item.action : "updated"}`,
      data: { command: this.command, item: label, dryRun: this.dryRun },
    });
  }

  fail(item: string, error: EngineError): void {
    this.failed.push({ item, kind: error.kind, message: error.message });
    this.events.emit({
      level: "error",
      type: "item-failed",
      message: `${item}: ${error.message}`,
      data: { command: this.command, item, kind: error.kind, status: error.status },
    });
  }

  status(): SyncStatus {
    if (this.failed.length === 0) {
      return "success";
    }
    return this.mutations > 0 ? "partial-failure" : "failure";
  }

  finish(): SyncOutcome {
    const outcome: SyncOutcome = {
      command: this.command,
      status: this.status(),
      dryRun: this.dryRun,
      succeeded: [...this.succeeded],
      failed: [...this.failed],
    };
    this.enter("done");
    return outcome;
  }
}
