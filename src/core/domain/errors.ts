export type AutomationErrorKind = "invalid-argument" | "io-failure" | "timeout";

export class AutomationError extends Error {
  constructor(
    message: string,
    readonly kind: AutomationErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AutomationError";
  }
}

/** Bad paths, empty strings and similar caller mistakes. Never retried. */
export class InvalidArgumentError extends AutomationError {
  constructor(message: string) {
    super(message, "invalid-argument");
    this.name = "InvalidArgumentError";
  }
}

/**
 * Filesystem or OS failure. Keeps the original error as `cause` and its
 * message verbatim; `errno` carries the Node error code (EACCES, ENOENT...).
 */
export class IoFailureError extends AutomationError {
  readonly errno?: string;

  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), "io-failure", {
      cause,
    });
    this.name = "IoFailureError";
    this.errno = errnoOf(cause);
  }
}

export class DownloadTimeoutError extends AutomationError {
  constructor(
    readonly watchDir: string,
    readonly extension: string,
    readonly waitedSeconds: number,
  ) {
    super(
      `Timeout waiting for download after ${waitedSeconds} seconds`,
      "timeout",
    );
    this.name = "DownloadTimeoutError";
  }
}

export function isTimeout(err: unknown): err is DownloadTimeoutError {
  return err instanceof DownloadTimeoutError;
}

export function isIoFailure(err: unknown): err is IoFailureError {
  return err instanceof IoFailureError;
}

function errnoOf(err: unknown): string | undefined {
  if (err !== null && typeof err === "object" && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
