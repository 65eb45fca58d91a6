export interface DownloadConfig {
  downloadDir: string;
  storageDir: string;
  maxWaitSeconds: number;
  pollIntervalMs: number;
  clearDownloadDir: boolean;
}

export interface BrowserConfig {
  headless: boolean;
  incognito: boolean;
  disableWebSecurity: boolean;
  domainSkipSecurity: string[];
  /** Chrome/Chromium binary. When unset, `channel` is used. */
  executablePath?: string;
  channel?: string;
  /** Profile directory for non-incognito sessions. */
  userDataDir: string;
}

/** Where the event log is persisted. Neither set means memory only. */
export interface LoggingConfig {
  eventLogDb?: string;
  eventLogJsonl?: string;
}

export interface Config {
  download: DownloadConfig;
  browser: BrowserConfig;
  logging: LoggingConfig;
}
