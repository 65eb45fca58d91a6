import { DownloadConfig } from "../domain/entities/config.entity.js";
import { DownloadResult } from "../domain/entities/download-result.entity.js";
import { InvalidArgumentError } from "../domain/errors.js";
import { IBrowserSession } from "../domain/services/browser-session.service.js";
import { ILogSink } from "../domain/services/log-sink.service.js";
import { WaitDownloadDefaults, WaitDownloadUseCase } from "./wait-download.use-case.js";

export interface DownloadViaBrowserRequest {
  /** Page or direct link that starts the download. */
  url: string;
  extension: string;
  /** Falls back to the configured storage directory. */
  storageDir?: string;
  maxWaitSeconds?: number;
  renameTo?: string;
  pollIntervalMs?: number;
}

/**
 * Opens `url` in an already configured session and collects what lands in
 * the session's download directory. Session lifecycle stays with the caller.
 * A download the browser fails to write ends the wait with that I/O failure.
 */
export class DownloadViaBrowserUseCase {
  private readonly waitDownload: WaitDownloadUseCase;

  constructor(
    private session: IBrowserSession,
    private logger?: ILogSink,
    defaults: Omit<WaitDownloadDefaults, "watchDir"> = {},
  ) {
    this.waitDownload = new WaitDownloadUseCase(logger, defaults);
  }

  static fromConfig(
    session: IBrowserSession,
    config: DownloadConfig,
    logger?: ILogSink,
  ): DownloadViaBrowserUseCase {
    return new DownloadViaBrowserUseCase(session, logger, {
      storageDir: config.storageDir,
      maxWaitSeconds: config.maxWaitSeconds,
      pollIntervalMs: config.pollIntervalMs,
    });
  }

  async execute(request: DownloadViaBrowserRequest): Promise<DownloadResult[]> {
    const watchDir = this.session.currentDownloadDir();
    if (!watchDir) {
      throw new InvalidArgumentError(
        "Browser session has no download directory; call configure() first",
      );
    }

    await this.session.navigate(request.url);
    return this.waitDownload.execute({
      watchDir,
      extension: request.extension,
      storageDir: request.storageDir,
      maxWaitSeconds: request.maxWaitSeconds,
      renameTo: request.renameTo,
      pollIntervalMs: request.pollIntervalMs,
      logger: this.logger,
      abortOn: () => this.session.downloadFailure(),
    });
  }
}

/**
 * Runs `work` against `session` and closes the session on every exit path,
 * including timeouts and I/O failures.
 */
export async function withBrowserSession<T>(
  session: IBrowserSession,
  work: (session: IBrowserSession) => Promise<T>,
): Promise<T> {
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}
