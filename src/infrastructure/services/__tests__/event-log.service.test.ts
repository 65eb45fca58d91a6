import { afterEach, describe, expect, it, vi } from "vitest";
import { LogEntry } from "../../../core/domain/entities/log-entry.entity.js";
import { IEventLogStore } from "../../../core/domain/repositories/event-log-store.repository.js";
import { toCsv } from "../../utils/log-table.utils.js";
import { EventLog } from "../event-log.service.js";

class MemoryStore implements IEventLogStore {
  saved: LogEntry[] = [];

  async saveEntry(entry: LogEntry): Promise<void> {
    this.saved.push(entry);
  }

  async getEntries(): Promise<LogEntry[]> {
    return [...this.saved];
  }
}

class BrokenStore implements IEventLogStore {
  async saveEntry(): Promise<void> {
    throw new Error("disk full");
  }

  async getEntries(): Promise<LogEntry[]> {
    return [];
  }
}

class ThrowingStore implements IEventLogStore {
  saveEntry(): Promise<void> {
    throw new Error("store closed");
  }

  async getEntries(): Promise<LogEntry[]> {
    return [];
  }
}

describe("EventLog", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("exports every record in call order", () => {
    const log = new EventLog();
    log.record("login", "Signed in");
    log.record("download", "Report requested", false);
    log.record("download", "Server returned 500", true);

    const table = log.export();
    expect(table.rows.map(({ Function, Message, IsError }) => ({ Function, Message, IsError }))).toEqual([
      { Function: "login", Message: "Signed in", IsError: false },
      { Function: "download", Message: "Report requested", IsError: false },
      { Function: "download", Message: "Server returned 500", IsError: true },
    ]);
    expect(log.size).toBe(3);
  });

  it("exports an empty table with fixed columns", () => {
    const table = new EventLog().export();
    expect(table.rows).toEqual([]);
    expect(table.columns).toEqual(["Date", "Function", "Message", "IsError"]);
  });

  it("stamps entries with the current time", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
    const log = new EventLog();
    log.record("step", "done");

    expect(log.export().rows[0]?.Date.toISOString()).toBe("2024-05-01T10:00:00.000Z");
  });

  it("hands out copies that cannot rewrite history", () => {
    const log = new EventLog();
    log.record("step", "original");

    const first = log.export();
    const row = first.rows[0];
    if (!row) throw new Error("expected one row");
    row.Message = "tampered";
    row.Date.setTime(0);
    first.rows.push({ Date: new Date(), Function: "x", Message: "y", IsError: false });

    const second = log.export();
    expect(second.rows).toHaveLength(1);
    expect(second.rows[0]?.Message).toBe("original");
    expect(second.rows[0]?.Date.getTime()).not.toBe(0);
  });

  it("returns frozen entries", () => {
    const log = new EventLog();
    log.record("step", "one");

    const entries = log.entries();
    expect(Object.isFrozen(entries)).toBe(true);
    expect(Object.isFrozen(entries[0])).toBe(true);
    expect(entries[0]?.context).toBe("step");
  });

  it("mirrors appends to its store", () => {
    const store = new MemoryStore();
    const log = new EventLog(store);
    log.record("step", "one");
    log.record("step", "two", true);

    expect(store.saved.map((e) => [e.message, e.isError])).toEqual([
      ["one", false],
      ["two", true],
    ]);
  });

  it("keeps recording when the store fails", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new EventLog(new BrokenStore());

    expect(() => log.record("step", "one")).not.toThrow();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(log.size).toBe(1);
    expect(consoleError).toHaveBeenCalledWith(
      "[EventLog] Failed to persist log entry:",
      new Error("disk full"),
    );
  });

  it("keeps recording when the store throws before returning a promise", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = new EventLog(new ThrowingStore());

    expect(() => log.record("step", "one")).not.toThrow();

    expect(log.size).toBe(1);
    expect(consoleError).toHaveBeenCalledWith(
      "[EventLog] Failed to persist log entry:",
      new Error("store closed"),
    );
  });

  it("rebuilds history from a store", async () => {
    const store = new MemoryStore();
    const original = new EventLog(store);
    original.record("a", "first");
    original.record("b", "second");

    const restored = await EventLog.fromStore(store);
    expect(restored.export().rows.map((r) => r.Message)).toEqual(["first", "second"]);
  });
});

describe("toCsv", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes a header for an empty table", () => {
    expect(toCsv(new EventLog().export())).toBe("Date,Function,Message,IsError\r\n");
  });

  it("quotes fields with commas and quotes", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T10:00:00.000Z"));
    const log = new EventLog();
    log.record("step", 'He said "hi", then left', true);

    expect(toCsv(log.export())).toBe(
      'Date,Function,Message,IsError\r\n2024-05-01T10:00:00.000Z,step,"He said ""hi"", then left",true\r\n',
    );
  });
});
