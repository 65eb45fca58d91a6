import { LogEntry } from "../entities/log-entry.entity.js";
export type { LogEntry } from "../entities/log-entry.entity.js";

export interface IEventLogStore {
  saveEntry(entry: LogEntry): Promise<void>;
  getEntries(): Promise<LogEntry[]>;
}
