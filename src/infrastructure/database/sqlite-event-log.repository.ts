import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  IEventLogStore,
  LogEntry,
} from "../../core/domain/repositories/event-log-store.repository.js";

/** Typed row shape returned by better-sqlite3 for tbl_event_log */
interface EventLogRow {
  timestamp: string;
  context: string;
  message: string;
  isError: number;
}

export class SqliteEventLogRepository implements IEventLogStore {
  private _db: Database.Database | null = null;

  constructor(private dbPath: string) {}

  private getDb() {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    this._db = new Database(this.dbPath);
    this._db.pragma("journal_mode = DELETE");
    this._db.pragma("synchronous = FULL");
    this._db.pragma("busy_timeout = 5000");
    this._db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_event_log (
        id        INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT    NOT NULL,
        context   TEXT    NOT NULL,
        message   TEXT    NOT NULL,
        isError   INTEGER NOT NULL DEFAULT 0
      )
    `);
    return this._db;
  }

  async saveEntry(entry: LogEntry): Promise<void> {
    this.getDb()
      .prepare(
        "INSERT INTO tbl_event_log (timestamp, context, message, isError) VALUES (?, ?, ?, ?)",
      )
      .run(
        entry.timestamp.toISOString(),
        entry.context,
        entry.message,
        entry.isError ? 1 : 0,
      );
  }

  async getEntries(): Promise<LogEntry[]> {
    const rows = this.getDb()
      .prepare(
        "SELECT timestamp, context, message, isError FROM tbl_event_log ORDER BY id ASC",
      )
      .all() as EventLogRow[];
    return rows.map((r) => ({
      timestamp: new Date(r.timestamp),
      context: r.context,
      message: r.message,
      isError: r.isError === 1,
    }));
  }

  close(): void {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }
}
