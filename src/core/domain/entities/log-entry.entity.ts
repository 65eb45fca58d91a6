export interface LogEntry {
  readonly timestamp: Date;
  /** Name of the function or step that produced the entry. */
  readonly context: string;
  readonly message: string;
  readonly isError: boolean;
}

/** Column order of an exported log table. */
export const LOG_COLUMNS = ["Date", "Function", "Message", "IsError"] as const;

export type LogColumn = (typeof LOG_COLUMNS)[number];

export interface LogRow {
  Date: Date;
  Function: string;
  Message: string;
  IsError: boolean;
}

export interface LogTable {
  columns: typeof LOG_COLUMNS;
  rows: LogRow[];
}
