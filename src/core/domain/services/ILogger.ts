export type AppLogLevel = "info" | "warn" | "error";

/**
 * One structured application-log record. `event` is a stable snake_case
 * identifier; any extra fields are serialized alongside it.
 */
export interface AppLogEvent {
  level: AppLogLevel;
  event: string;
  message?: string;
  [key: string]: unknown;
}

export interface ILogger {
  init(runId: string): void;
  log(event: AppLogEvent): void;
  close(): Promise<void>;
}
