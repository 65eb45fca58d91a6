import {
  constants,
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
  unlinkSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { InvalidArgumentError, IoFailureError } from "../../core/domain/errors.js";
import { ILogSink } from "../../core/domain/services/log-sink.service.js";

/**
 * Make sure `path` is a directory. An existing directory is purged of every
 * file and subdirectory when `clearExisting` is set; the directory itself is
 * kept. Missing directories are created along with their parents.
 */
export function ensureFolder(
  path: string,
  clearExisting = true,
  logger?: ILogSink,
): void {
  if (!path) throw new InvalidArgumentError("Path cannot be empty");

  if (existsSync(path)) {
    let isDirectory: boolean;
    try {
      isDirectory = statSync(path).isDirectory();
    } catch (err) {
      throw new IoFailureError(path, err);
    }
    if (!isDirectory) {
      throw new InvalidArgumentError(`'${path}' is not a directory`);
    }
    if (clearExisting) {
      const removed = clearFolderContents(path);
      logger?.record(
        "ensureFolder",
        `Cleared ${removed} item(s) from ${path}`,
      );
    }
    return;
  }

  try {
    mkdirSync(path, { recursive: true });
  } catch (err) {
    throw new IoFailureError(path, err);
  }
  logger?.record("ensureFolder", `Created folder ${path}`);
}

function clearFolderContents(dir: string): number {
  let count = 0;
  try {
    for (const name of readdirSync(dir)) {
      rmSync(join(dir, name), { recursive: true, force: true });
      count++;
    }
  } catch (err) {
    throw new IoFailureError(dir, err);
  }
  return count;
}

/**
 * Move `source` to `target`. Falls back to copy-then-rename across devices so
 * `target` only ever appears complete; the source is removed last. On failure
 * only the source is left.
 */
export function moveFile(source: string, target: string): void {
  try {
    renameSync(source, target);
    return;
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) {
      throw err;
    }
  }

  const staging = join(dirname(target), `.${basename(target)}.partial`);
  try {
    copyFileSync(source, staging, constants.COPYFILE_EXCL);
    renameSync(staging, target);
  } catch (err) {
    rmSync(staging, { force: true });
    throw err;
  }
  try {
    unlinkSync(source);
  } catch (err) {
    // The source stays authoritative; drop the copy.
    rmSync(target, { force: true });
    throw err;
  }
}
