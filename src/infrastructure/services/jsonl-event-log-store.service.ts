import { appendFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import {
  IEventLogStore,
  LogEntry,
} from "../../core/domain/repositories/event-log-store.repository.js";

const StoredEntrySchema = z.object({
  timestamp: z.string().datetime(),
  context: z.string(),
  message: z.string(),
  isError: z.boolean(),
});

/** One JSON object per line, appended synchronously. */
export class JsonLinesEventLogStore implements IEventLogStore {
  constructor(private logPath: string) {}

  async saveEntry(entry: LogEntry): Promise<void> {
    const dir = dirname(this.logPath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const line = JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      context: entry.context,
      message: entry.message,
      isError: entry.isError,
    });
    appendFileSync(this.logPath, line + "\n", "utf-8");
  }

  async getEntries(): Promise<LogEntry[]> {
    if (!existsSync(this.logPath)) return [];
    const raw = readFileSync(this.logPath, "utf-8");
    const entries: LogEntry[] = [];
    for (const [index, line] of raw.split("\n").entries()) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        console.error(
          `[JsonLinesEventLogStore] Skipping unreadable line ${index + 1} of ${this.logPath}`,
        );
        continue;
      }
      const result = StoredEntrySchema.safeParse(parsed);
      if (!result.success) {
        console.error(
          `[JsonLinesEventLogStore] Skipping invalid entry on line ${index + 1}: ${result.error.issues[0]?.message}`,
        );
        continue;
      }
      entries.push({ ...result.data, timestamp: new Date(result.data.timestamp) });
    }
    return entries;
  }
}
