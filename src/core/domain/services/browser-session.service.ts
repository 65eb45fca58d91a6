import { IoFailureError } from "../errors.js";

export interface BrowserFlags {
  headless: boolean;
  incognito: boolean;
  /** Purge the download directory before the session starts. */
  clearDownloadDir: boolean;
  disableWebSecurity: boolean;
  /** Origins treated as secure when web security is disabled. */
  domainSkipSecurity: string[];
}

export const DEFAULT_BROWSER_FLAGS: Readonly<BrowserFlags> = Object.freeze({
  headless: true,
  incognito: true,
  clearDownloadDir: true,
  disableWebSecurity: false,
  domainSkipSecurity: [],
});

/**
 * Opaque handle over an external browser. Callers own the lifecycle and must
 * call `close()` on every exit path.
 */
export interface IBrowserSession {
  configure(downloadDir: string, flags?: Partial<BrowserFlags>): Promise<void>;
  navigate(url: string): Promise<void>;
  currentDownloadDir(): string | null;
  /**
   * First download the session failed to write since the last `configure()`,
   * or null. Lets callers abort instead of waiting out a timeout.
   */
  downloadFailure(): IoFailureError | null;
  close(): Promise<void>;
}
