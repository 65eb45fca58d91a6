/**
 * Helpers for data-pipeline automation scripts: an exportable event log,
 * folder create/clear, and headless-browser download collection.
 */

export type {
  LogEntry,
  LogRow,
  LogTable,
  LogColumn,
} from "./core/domain/entities/log-entry.entity.js";
export { LOG_COLUMNS } from "./core/domain/entities/log-entry.entity.js";
export type { DownloadResult } from "./core/domain/entities/download-result.entity.js";
export type {
  Config,
  DownloadConfig,
  BrowserConfig,
  LoggingConfig,
} from "./core/domain/entities/config.entity.js";
export {
  AutomationError,
  InvalidArgumentError,
  IoFailureError,
  DownloadTimeoutError,
  isTimeout,
  isIoFailure,
} from "./core/domain/errors.js";
export type { AutomationErrorKind } from "./core/domain/errors.js";
export type { ILogSink } from "./core/domain/services/log-sink.service.js";
export type { IEventLogStore } from "./core/domain/repositories/event-log-store.repository.js";
export {
  DEFAULT_BROWSER_FLAGS,
} from "./core/domain/services/browser-session.service.js";
export type {
  BrowserFlags,
  IBrowserSession,
} from "./core/domain/services/browser-session.service.js";

export {
  WaitDownloadUseCase,
  waitAndCollect,
  DEFAULT_MAX_WAIT_SECONDS,
  DEFAULT_POLL_INTERVAL_MS,
} from "./core/use-cases/wait-download.use-case.js";
export type {
  WaitDownloadRequest,
  WaitDownloadInput,
  WaitDownloadDefaults,
} from "./core/use-cases/wait-download.use-case.js";
export {
  DownloadViaBrowserUseCase,
  withBrowserSession,
} from "./core/use-cases/download-via-browser.use-case.js";
export type { DownloadViaBrowserRequest } from "./core/use-cases/download-via-browser.use-case.js";

export { EventLog } from "./infrastructure/services/event-log.service.js";
export { JsonLinesEventLogStore } from "./infrastructure/services/jsonl-event-log-store.service.js";
export { SqliteEventLogRepository } from "./infrastructure/database/sqlite-event-log.repository.js";
export {
  PlaywrightBrowserSession,
  PARTIAL_DOWNLOAD_SUFFIX,
} from "./infrastructure/services/playwright-browser.service.js";
export type {
  PlaywrightSessionOptions,
  ChromiumLauncher,
} from "./infrastructure/services/playwright-browser.service.js";
export { ensureFolder, moveFile } from "./infrastructure/utils/folder.utils.js";
export {
  normalizeExtension,
  isTransientDownload,
  TRANSIENT_DOWNLOAD_SUFFIXES,
} from "./infrastructure/utils/file-match.utils.js";
export { buildChromiumArgs, toOrigin } from "./infrastructure/utils/chromium-options.utils.js";
export { toCsv } from "./infrastructure/utils/log-table.utils.js";
export {
  loadConfig,
  getConfigPath,
  createEventLogStore,
} from "./infrastructure/utils/config.utils.js";
