import { existsSync, readdirSync, statSync } from "node:fs";
import { dirname, extname, join } from "node:path";

/** Suffixes browsers put on files that are still being written. */
export const TRANSIENT_DOWNLOAD_SUFFIXES = [
  "crdownload",
  "part",
  "partial",
  "download",
  "tmp",
] as const;

/** ".PDF" -> "pdf". */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\.+/, "").toLowerCase();
}

export function isTransientDownload(fileName: string): boolean {
  const ext = normalizeExtension(extname(fileName));
  return (TRANSIENT_DOWNLOAD_SUFFIXES as readonly string[]).includes(ext);
}

export interface FolderScan {
  /** Completed files carrying the wanted extension, sorted by name. */
  matches: string[];
  /** Files still being written whose final name would match. */
  pending: string[];
}

export function scanForDownloads(dir: string, extension: string): FolderScan {
  const suffix = `.${extension}`;
  const matches: string[] = [];
  const pending: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const lower = entry.name.toLowerCase();
    if (isTransientDownload(lower)) {
      const finalName = lower.slice(0, lower.length - extname(lower).length);
      if (finalName.endsWith(suffix)) pending.push(entry.name);
      continue;
    }
    if (lower.endsWith(suffix) && lower.length > suffix.length) {
      matches.push(entry.name);
    }
  }
  const byName = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
  return { matches: matches.sort(byName), pending: pending.sort(byName) };
}

/** Strip `.<extension>` from a matched file name, keeping the stem's case. */
export function stemOf(fileName: string, extension: string): string {
  return fileName.slice(0, fileName.length - extension.length - 1);
}

/**
 * First free `<stem>.<ext>`, `<stem>_1.<ext>`, `<stem>_2.<ext>`... in `dir`
 * that is not already on disk nor in `taken`.
 */
export function resolveDestinationName(
  dir: string,
  stem: string,
  extension: string,
  taken: ReadonlySet<string>,
): string {
  for (let n = 0; ; n++) {
    const name = n === 0 ? `${stem}.${extension}` : `${stem}_${n}.${extension}`;
    if (!taken.has(name) && !existsSync(join(dir, name))) return name;
  }
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Closest path at or above `path` that exists. */
export function existingAncestor(path: string): string {
  let current = path;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}
