import {
  ERROR_LEVEL,
  LogEntry,
  LogEntryPredicate,
  MalformedLinePolicy,
} from "../entities/log-entry.entity.js";
import { FormatError } from "../errors.js";
import { TimestampService } from "./timestamp.service.js";

/** Either structural marker of the line format. */
const DELIMITER = / \[|\] /;

export interface ParseLinesOptions {
  /** "abort" throws on the first malformed line; "skip" collects them. */
  onMalformed?: MalformedLinePolicy;
}

export interface ParseLinesResult {
  entries: LogEntry[];
  /** Malformed lines in input order, each tagged with its line number. */
  rejected: FormatError[];
}

/**
 * Parses `<timestamp> [<level>] <message>` lines and runs read-only queries
 * over the resulting entries. Stateless: every method is a pure function of
 * its arguments and preserves input order.
 */
export class LogAnalyzer {
  /**
   * A message or level containing ` [` or `] ` yields more than three parts
   * and is rejected rather than split at a guessed position.
   */
  parse(line: string): LogEntry {
    const parts = line.split(DELIMITER);
    if (parts.length !== 3) {
      throw new FormatError(line, "Invalid log format");
    }
    const [timestampText, level, message] = parts;
    const timestamp = TimestampService.parse(timestampText);
    if (!timestamp) {
      throw new FormatError(line, `Invalid timestamp "${timestampText}"`);
    }
    return { timestamp, level, message };
  }

  /** Inverse of {@link parse} for delimiter-free messages. Nothing is escaped. */
  format(entry: LogEntry): string {
    return `${TimestampService.format(entry.timestamp)} [${entry.level}] ${entry.message}`;
  }

  parseLines(
    lines: Iterable<string>,
    options: ParseLinesOptions = {},
  ): ParseLinesResult {
    const onMalformed = options.onMalformed ?? "abort";
    const entries: LogEntry[] = [];
    const rejected: FormatError[] = [];

    let lineNumber = 0;
    for (const line of lines) {
      lineNumber++;
      try {
        entries.push(this.parse(line));
      } catch (err) {
        if (!(err instanceof FormatError)) throw err;
        const tagged = err.atLine(lineNumber);
        if (onMalformed === "abort") throw tagged;
        rejected.push(tagged);
      }
    }

    return { entries, rejected };
  }

  /** Level → number of entries, keys in first-seen order. */
  countByLevel(entries: readonly LogEntry[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const entry of entries) {
      counts.set(entry.level, (counts.get(entry.level) ?? 0) + 1);
    }
    return counts;
  }

  /**
   * ERROR entries strictly newer than `now - windowMs`.
   * A window of zero or less selects nothing.
   */
  recentErrors(
    entries: readonly LogEntry[],
    now: Date,
    windowMs: number,
  ): LogEntry[] {
    if (!(windowMs > 0)) return [];
    const cutoff = now.getTime() - windowMs;
    return entries.filter(
      (e) => e.level === ERROR_LEVEL && e.timestamp.getTime() > cutoff,
    );
  }

  exportFiltered(
    entries: readonly LogEntry[],
    predicate: LogEntryPredicate,
  ): string[] {
    return entries.filter(predicate).map((e) => this.format(e));
  }

  /** Last entry with the given level, or undefined when there is none. */
  findLatest(entries: readonly LogEntry[], level: string): LogEntry | undefined {
    for (let i = entries.length - 1; i >= 0; i--) {
      if (entries[i].level === level) return entries[i];
    }
    return undefined;
  }
}

export const byLevel =
  (level: string): LogEntryPredicate =>
  (entry) =>
    entry.level === level;
