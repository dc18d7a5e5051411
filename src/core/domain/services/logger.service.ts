export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent =
  | "batch.start"
  | "batch.done"
  | "document.start"
  | "document.done"
  | "page.attempt"
  | "page.empty"
  | "retry.scheduled"
  | "merge.applied"
  | "mirror.skipped"
  | "mirror.uploaded"
  | "artifact.cleanup"
  | "debug.write_failed"
  | "config.loaded";

export interface LogEntry {
  event: LogEvent;
  level?: LogLevel;
  message?: string;
  runId?: string;
  timestamp?: string;
  sourceFile?: string;
  brand?: string;
  page?: number;
  [key: string]: unknown;
}

export interface ILogger {
  init(runId: string): void;
  log(entry: LogEntry): void;
  close(): void;
}
