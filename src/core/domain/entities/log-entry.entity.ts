/** Level used by the recent-errors query. Matched case-sensitively. */
export const ERROR_LEVEL = "ERROR";

/**
 * One parsed line of a `<timestamp> [<level>] <message>` log file.
 * The timestamp has second resolution. Its `yyyy-MM-dd HH:mm:ss` fields
 * are held in the UTC frame of a Date.
 */
export interface LogEntry {
  timestamp: Date;
  level: string;
  message: string;
}

export type LogEntryPredicate = (entry: LogEntry) => boolean;

export type MalformedLinePolicy = "abort" | "skip";
