/**
 * Capability every logging-aware helper accepts. Passing no sink changes
 * observability only, never behavior.
 */
export interface ILogSink {
  record(context: string, message: string, isError?: boolean): void;
}
