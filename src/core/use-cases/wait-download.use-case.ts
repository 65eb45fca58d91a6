import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import { DownloadConfig } from "../domain/entities/config.entity.js";
import { DownloadResult } from "../domain/entities/download-result.entity.js";
import {
  AutomationError,
  DownloadTimeoutError,
  InvalidArgumentError,
  IoFailureError,
} from "../domain/errors.js";
import { ILogSink } from "../domain/services/log-sink.service.js";
import {
  FolderScan,
  existingAncestor,
  isDirectory,
  isTransientDownload,
  normalizeExtension,
  resolveDestinationName,
  scanForDownloads,
  stemOf,
} from "../../infrastructure/utils/file-match.utils.js";
import {
  ensureFolder,
  moveFile,
} from "../../infrastructure/utils/folder.utils.js";

export const DEFAULT_MAX_WAIT_SECONDS = 300;
export const DEFAULT_POLL_INTERVAL_MS = 1000;

const CONTEXT = "waitAndCollect";

export interface WaitDownloadRequest {
  /** Folder the browser downloads into. */
  watchDir: string;
  /** Wanted extension, with or without the leading dot. Case-insensitive. */
  extension: string;
  /** Destination folder. Created when missing, never cleared. */
  storageDir: string;
  maxWaitSeconds?: number;
  /** New stem for moved files; siblings get `_1`, `_2`... */
  renameTo?: string;
  pollIntervalMs?: number;
  logger?: ILogSink;
  /**
   * Polled between scans. A non-null error stops the wait and is thrown as is,
   * e.g. a browser that could not write the download.
   */
  abortOn?: () => AutomationError | null;
}

/** Values a request may leave out when the use case was built from config. */
export type WaitDownloadDefaults = Partial<
  Pick<WaitDownloadRequest, "watchDir" | "storageDir" | "maxWaitSeconds" | "pollIntervalMs">
>;

export type WaitDownloadInput = Omit<WaitDownloadRequest, "watchDir" | "storageDir"> &
  Partial<Pick<WaitDownloadRequest, "watchDir" | "storageDir">>;

interface ValidatedRequest {
  watchDir: string;
  storageDir: string;
  extension: string;
  maxWaitSeconds: number;
  pollIntervalMs: number;
  renameTo?: string;
  abortOn?: () => AutomationError | null;
}

/**
 * Waits for a browser download to complete in `watchDir`, then moves every
 * completed file with the wanted extension into `storageDir`.
 *
 * Rejects with `DownloadTimeoutError` when nothing shows up within
 * `maxWaitSeconds`, with `IoFailureError` on the first failed move, and with
 * whatever `abortOn` reports. Folders and timings left out of a request come
 * from the defaults the use case was built with.
 */
export class WaitDownloadUseCase {
  constructor(
    private logger?: ILogSink,
    private defaults: WaitDownloadDefaults = {},
  ) {}

  static fromConfig(config: DownloadConfig, logger?: ILogSink): WaitDownloadUseCase {
    return new WaitDownloadUseCase(logger, {
      watchDir: config.downloadDir,
      storageDir: config.storageDir,
      maxWaitSeconds: config.maxWaitSeconds,
      pollIntervalMs: config.pollIntervalMs,
    });
  }

  async execute(input: WaitDownloadInput): Promise<DownloadResult[]> {
    const logger = input.logger ?? this.logger;
    const req = this.validate({
      ...input,
      watchDir: input.watchDir ?? this.defaults.watchDir ?? "",
      storageDir: input.storageDir ?? this.defaults.storageDir ?? "",
      maxWaitSeconds: input.maxWaitSeconds ?? this.defaults.maxWaitSeconds,
      pollIntervalMs: input.pollIntervalMs ?? this.defaults.pollIntervalMs,
    });

    ensureFolder(req.watchDir, false, logger);
    ensureFolder(req.storageDir, false, logger);

    logger?.record(
      CONTEXT,
      `Waiting for *.${req.extension} files in ${req.watchDir} (max ${req.maxWaitSeconds}s)`,
    );

    const deadline = performance.now() + req.maxWaitSeconds * 1000;
    let lastPending = "";

    for (;;) {
      const scan = this.scan(req, logger);
      if (scan.matches.length > 0) {
        logger?.record(
          CONTEXT,
          `Found downloaded files: ${scan.matches.join(", ")}`,
        );
        return this.collect(req, scan.matches, logger);
      }

      const pendingKey = scan.pending.join("\n");
      if (scan.pending.length > 0 && pendingKey !== lastPending) {
        logger?.record(
          CONTEXT,
          `Download in progress: ${scan.pending.join(", ")}`,
        );
      }
      lastPending = pendingKey;

      const failure = req.abortOn?.();
      if (failure) {
        logger?.record(CONTEXT, `Stopped waiting: ${failure.message}`, true);
        throw failure;
      }

      const remaining = deadline - performance.now();
      if (remaining <= 0) {
        logger?.record(
          CONTEXT,
          `Timeout waiting for download after ${req.maxWaitSeconds} seconds`,
          true,
        );
        throw new DownloadTimeoutError(
          req.watchDir,
          req.extension,
          req.maxWaitSeconds,
        );
      }

      await new Promise((resolve) =>
        setTimeout(resolve, Math.min(req.pollIntervalMs, remaining)),
      );
    }
  }

  private validate(request: WaitDownloadRequest): ValidatedRequest {
    if (!request.watchDir || !request.storageDir) {
      throw new InvalidArgumentError("Folder paths cannot be empty");
    }
    const extension = normalizeExtension(request.extension ?? "");
    if (!extension) throw new InvalidArgumentError("Extension cannot be empty");
    if (isTransientDownload(`file.${extension}`)) {
      throw new InvalidArgumentError(
        `'${extension}' marks an unfinished download and cannot be collected`,
      );
    }

    const maxWaitSeconds = request.maxWaitSeconds ?? DEFAULT_MAX_WAIT_SECONDS;
    if (!Number.isFinite(maxWaitSeconds) || maxWaitSeconds < 0) {
      throw new InvalidArgumentError(
        `maxWaitSeconds must be a non-negative number, got ${maxWaitSeconds}`,
      );
    }
    const pollIntervalMs = request.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new InvalidArgumentError(
        `pollIntervalMs must be a positive number, got ${pollIntervalMs}`,
      );
    }

    const renameTo = request.renameTo?.trim() || undefined;
    if (renameTo && /[\\/]/.test(renameTo)) {
      throw new InvalidArgumentError(
        `renameTo must be a plain file name, got '${renameTo}'`,
      );
    }

    const watchDir = resolve(request.watchDir);
    const storageDir = resolve(request.storageDir);
    for (const dir of [watchDir, storageDir]) {
      if (existsSync(dir)) {
        if (!isDirectory(dir)) {
          throw new InvalidArgumentError(`'${dir}' is not a directory`);
        }
        continue;
      }
      const ancestor = existingAncestor(dir);
      if (!isDirectory(ancestor)) {
        throw new InvalidArgumentError(
          `Cannot create '${dir}': '${ancestor}' is not a directory`,
        );
      }
    }
    if (storageDir === watchDir) {
      throw new InvalidArgumentError(
        "Storage directory must differ from the watch directory",
      );
    }

    return {
      watchDir,
      storageDir,
      extension,
      maxWaitSeconds,
      pollIntervalMs,
      renameTo,
      abortOn: request.abortOn,
    };
  }

  private scan(req: ValidatedRequest, logger?: ILogSink): FolderScan {
    try {
      return scanForDownloads(req.watchDir, req.extension);
    } catch (err) {
      logger?.record(
        CONTEXT,
        `Failed to list ${req.watchDir}: ${messageOf(err)}`,
        true,
      );
      throw new IoFailureError(req.watchDir, err);
    }
  }

  private collect(
    req: ValidatedRequest,
    matches: string[],
    logger?: ILogSink,
  ): DownloadResult[] {
    const taken = new Set<string>();
    const results: DownloadResult[] = [];

    for (const name of matches) {
      const stem = req.renameTo ?? stemOf(name, req.extension);
      const destName = resolveDestinationName(
        req.storageDir,
        stem,
        req.extension,
        taken,
      );
      taken.add(destName);

      const source = join(req.watchDir, name);
      const target = join(req.storageDir, destName);
      try {
        moveFile(source, target);
      } catch (err) {
        logger?.record(
          CONTEXT,
          `Failed to move file ${source}: ${messageOf(err)}`,
          true,
        );
        throw new IoFailureError(source, err);
      }
      logger?.record(CONTEXT, `Moved file from ${source} to ${target}`);
      results.push({
        originalName: name,
        finalPath: target,
        extension: req.extension,
      });
    }

    return results;
  }
}

export function waitAndCollect(
  request: WaitDownloadRequest,
): Promise<DownloadResult[]> {
  return new WaitDownloadUseCase().execute(request);
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
