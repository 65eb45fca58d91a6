import { LogTable } from "../../core/domain/entities/log-entry.entity.js";

function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** RFC 4180 CSV with a header row; dates in ISO-8601. */
export function toCsv(table: LogTable): string {
  const lines = [table.columns.join(",")];
  for (const row of table.rows) {
    lines.push(
      [
        row.Date.toISOString(),
        csvField(row.Function),
        csvField(row.Message),
        String(row.IsError),
      ].join(","),
    );
  }
  return lines.join("\r\n") + "\r\n";
}
