import { accessSync, constants, existsSync, renameSync, rmSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { chromium } from "playwright-core";
import { Config } from "../../core/domain/entities/config.entity.js";
import { InvalidArgumentError, IoFailureError } from "../../core/domain/errors.js";
import {
  BrowserFlags,
  DEFAULT_BROWSER_FLAGS,
  IBrowserSession,
} from "../../core/domain/services/browser-session.service.js";
import { ILogSink } from "../../core/domain/services/log-sink.service.js";
import { buildChromiumArgs } from "../utils/chromium-options.utils.js";
import { resolveDestinationName } from "../utils/file-match.utils.js";
import { ensureFolder } from "../utils/folder.utils.js";

/*
 * The slice of playwright-core this session drives. `chromium` satisfies
 * ChromiumLauncher; tests substitute an in-process fake.
 */

export interface DownloadHandle {
  suggestedFilename(): string;
  saveAs(path: string): Promise<void>;
}

export interface PageHandle {
  goto(url: string): Promise<unknown>;
  on(event: "download", listener: (download: DownloadHandle) => void): unknown;
}

export interface ContextHandle {
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

export interface ContextOptions {
  acceptDownloads: boolean;
  ignoreHTTPSErrors: boolean;
}

export interface BrowserHandle {
  newContext(options: ContextOptions): Promise<ContextHandle>;
  close(): Promise<void>;
}

export interface ChromiumLaunchOptions {
  headless: boolean;
  args: string[];
  executablePath?: string;
  channel?: string;
}

export interface ChromiumLauncher {
  launch(options: ChromiumLaunchOptions): Promise<BrowserHandle>;
  launchPersistentContext(
    userDataDir: string,
    options: ChromiumLaunchOptions & ContextOptions,
  ): Promise<ContextHandle>;
}

export interface PlaywrightSessionOptions {
  executablePath?: string;
  /** Installed browser channel such as "chrome" or "msedge". */
  channel?: string;
  /** Profile directory used when the session is not incognito. */
  userDataDir?: string;
  /** Defaults for every `configure()` call; per-call flags win. */
  flags?: Partial<BrowserFlags>;
  logger?: ILogSink;
  launcher?: ChromiumLauncher;
}

/** Suffix a download carries until it is completely written. */
export const PARTIAL_DOWNLOAD_SUFFIX = ".crdownload";

export class PlaywrightBrowserSession implements IBrowserSession {
  private browser: BrowserHandle | null = null;
  private context: ContextHandle | null = null;
  private page: PageHandle | null = null;
  private downloadDir: string | null = null;
  private pendingSaves = new Set<Promise<void>>();
  /** Names reserved by saves still in flight. */
  private savingNames = new Set<string>();
  private failure: IoFailureError | null = null;
  private readonly launcher: ChromiumLauncher;
  private readonly logger?: ILogSink;

  constructor(private options: PlaywrightSessionOptions = {}) {
    this.launcher = options.launcher ?? chromium;
    this.logger = options.logger;
  }

  static fromConfig(
    config: Config,
    options: Pick<PlaywrightSessionOptions, "logger" | "launcher"> = {},
  ): PlaywrightBrowserSession {
    const { browser, download } = config;
    return new PlaywrightBrowserSession({
      executablePath: browser.executablePath,
      channel: browser.channel,
      userDataDir: browser.userDataDir,
      flags: {
        headless: browser.headless,
        incognito: browser.incognito,
        disableWebSecurity: browser.disableWebSecurity,
        domainSkipSecurity: browser.domainSkipSecurity,
        clearDownloadDir: download.clearDownloadDir,
      },
      ...options,
    });
  }

  currentDownloadDir(): string | null {
    return this.downloadDir;
  }

  downloadFailure(): IoFailureError | null {
    return this.failure;
  }

  /**
   * Prepares `downloadDir` and starts Chromium on the first call. Later calls
   * only re-point where downloads land.
   */
  async configure(
    downloadDir: string,
    flags: Partial<BrowserFlags> = {},
  ): Promise<void> {
    if (!downloadDir) {
      throw new InvalidArgumentError("Download directory cannot be empty");
    }
    const resolved: BrowserFlags = {
      ...DEFAULT_BROWSER_FLAGS,
      ...this.options.flags,
      ...flags,
    };
    const dir = resolve(downloadDir);

    ensureFolder(dir, resolved.clearDownloadDir, this.logger);
    try {
      accessSync(dir, constants.W_OK);
    } catch (err) {
      throw new IoFailureError(dir, err);
    }

    if (!this.page) await this.launch(resolved, dir);
    this.downloadDir = dir;
    this.failure = null;
    this.logger?.record("enableDownloads", `Enabled downloads to ${dir}`);
  }

  async navigate(url: string): Promise<void> {
    if (!url) throw new InvalidArgumentError("URL cannot be empty");
    if (!this.page) {
      throw new InvalidArgumentError(
        "Browser session is not configured; call configure() first",
      );
    }
    try {
      await this.page.goto(url);
    } catch (err) {
      // Direct file links abort the navigation once the download starts.
      if (!(err instanceof Error && err.message.includes("Download is starting"))) {
        this.logger?.record("navigate", `Failed to open ${url}: ${messageOf(err)}`, true);
        throw err;
      }
    }
    this.logger?.record("navigate", `Opened ${url}`);
  }

  /** Waits for in-flight saves, then shuts the browser down. */
  async close(): Promise<void> {
    await Promise.allSettled([...this.pendingSaves]);

    const { context, browser } = this;
    const wasOpen = context !== null || browser !== null;
    this.page = null;
    this.context = null;
    this.browser = null;

    try {
      await context?.close();
    } finally {
      await browser?.close();
    }
    if (wasOpen) this.logger?.record("closeBrowserSession", "Closed browser session");
  }

  private async launch(flags: BrowserFlags, downloadDir: string): Promise<void> {
    const launchOptions: ChromiumLaunchOptions = {
      headless: flags.headless,
      args: buildChromiumArgs(flags),
      ...(this.options.executablePath
        ? { executablePath: this.options.executablePath }
        : this.options.channel
          ? { channel: this.options.channel }
          : {}),
    };
    const contextOptions: ContextOptions = {
      acceptDownloads: true,
      ignoreHTTPSErrors: flags.disableWebSecurity,
    };

    let page: PageHandle;
    try {
      if (flags.incognito) {
        this.browser = await this.launcher.launch(launchOptions);
        this.context = await this.browser.newContext(contextOptions);
      } else {
        const profileDir = resolve(
          this.options.userDataDir ?? join(process.cwd(), "data", "profile"),
        );
        this.context = await this.launcher.launchPersistentContext(profileDir, {
          ...launchOptions,
          ...contextOptions,
        });
      }
      page = await this.context.newPage();
    } catch (err) {
      const msg = messageOf(err);
      this.logger?.record(
        "createBrowserSession",
        `Failed to create browser session: ${msg}`,
        true,
      );
      await this.close();
      throw new Error(`Failed to create browser session: ${msg}`, { cause: err });
    }

    page.on("download", (download) => this.track(download));
    this.page = page;
    this.logger?.record(
      "createBrowserSession",
      `Created browser session with download directory ${downloadDir}`,
    );
  }

  private track(download: DownloadHandle): void {
    const saving: Promise<void> = this.saveDownload(download).finally(() => {
      this.pendingSaves.delete(saving);
    });
    this.pendingSaves.add(saving);
  }

  /**
   * Writes under the partial suffix and renames once complete, so watchers
   * never see a half-written file under its final name.
   */
  private async saveDownload(download: DownloadHandle): Promise<void> {
    const dir = this.downloadDir;
    if (!dir) return;
    const name = this.freeName(dir, basename(download.suggestedFilename()));
    const target = join(dir, name);
    const partial = target + PARTIAL_DOWNLOAD_SUFFIX;
    this.savingNames.add(name);
    try {
      await download.saveAs(partial);
      renameSync(partial, target);
      this.logger?.record("saveDownload", `Saved download ${name} to ${dir}`);
    } catch (err) {
      rmSync(partial, { force: true });
      this.logger?.record(
        "saveDownload",
        `Failed to save download ${name}: ${messageOf(err)}`,
        true,
      );
      this.failure ??= new IoFailureError(target, err);
    } finally {
      this.savingNames.delete(name);
    }
  }

  /** `report.pdf`, then `report_1.pdf`... skipping files on disk and in flight. */
  private freeName(dir: string, suggested: string): string {
    const ext = extname(suggested);
    if (!ext || ext === suggested) {
      let name = suggested;
      for (let n = 1; this.savingNames.has(name) || existsSync(join(dir, name)); n++) {
        name = `${suggested}_${n}`;
      }
      return name;
    }
    return resolveDestinationName(
      dir,
      suggested.slice(0, -ext.length),
      ext.slice(1),
      this.savingNames,
    );
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
