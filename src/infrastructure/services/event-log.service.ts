import {
  LOG_COLUMNS,
  LogEntry,
  LogTable,
} from "../../core/domain/entities/log-entry.entity.js";
import { IEventLogStore } from "../../core/domain/repositories/event-log-store.repository.js";
import { ILogSink } from "../../core/domain/services/log-sink.service.js";

/**
 * Append-only, in-memory history of automation steps. Entries are frozen on
 * creation and exported as fresh copies, so callers cannot rewrite history
 * through an export. When a store is given every append is mirrored to it.
 */
export class EventLog implements ILogSink {
  private readonly history: LogEntry[] = [];

  constructor(private store?: IEventLogStore) {}

  static async fromStore(store: IEventLogStore): Promise<EventLog> {
    const log = new EventLog(store);
    for (const entry of await store.getEntries()) {
      log.history.push(freeze(entry));
    }
    return log;
  }

  get size(): number {
    return this.history.length;
  }

  record(context: string, message: string, isError = false): void {
    const entry = freeze({
      timestamp: new Date(),
      context: String(context),
      message: String(message),
      isError: Boolean(isError),
    });
    this.history.push(entry);

    if (!this.store) return;
    // record() must never fail, so store errors only reach the console.
    const report = (err: unknown) => {
      console.error("[EventLog] Failed to persist log entry:", err);
    };
    try {
      this.store.saveEntry(entry).catch(report);
    } catch (err) {
      report(err);
    }
  }

  entries(): readonly LogEntry[] {
    return Object.freeze(this.history.map(freeze));
  }

  export(): LogTable {
    return {
      columns: LOG_COLUMNS,
      rows: this.history.map((e) => ({
        Date: new Date(e.timestamp.getTime()),
        Function: e.context,
        Message: e.message,
        IsError: e.isError,
      })),
    };
  }
}

function freeze(entry: LogEntry): LogEntry {
  return Object.freeze({
    timestamp: new Date(entry.timestamp.getTime()),
    context: entry.context,
    message: entry.message,
    isError: entry.isError,
  });
}
