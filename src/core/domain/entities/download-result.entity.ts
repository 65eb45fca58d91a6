export interface DownloadResult {
  /** File name as it appeared in the watch directory. */
  originalName: string;
  /** Absolute path of the moved file inside the storage directory. */
  finalPath: string;
  /** Canonical extension: lowercase, no leading dot. */
  extension: string;
}
