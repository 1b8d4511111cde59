const TIMESTAMP_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export class TimestampService {
  /**
   * Parses `yyyy-MM-dd HH:mm:ss` as a UTC wall-clock time.
   * Returns undefined for text that does not match the pattern or names a
   * date that does not exist (2024-02-30, 25:00:00, ...).
   */
  static parse(text: string): Date | undefined {
    const match = TIMESTAMP_REGEX.exec(text);
    if (!match) return undefined;
    const [year, month, day, hours, minutes, seconds] = match
      .slice(1)
      .map(Number);

    // setUTCFullYear keeps years below 100 as-is, unlike Date.UTC
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hours, minutes, seconds, 0);

    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day ||
      date.getUTCHours() !== hours ||
      date.getUTCMinutes() !== minutes ||
      date.getUTCSeconds() !== seconds
    ) {
      return undefined;
    }
    return date;
  }

  /** Renders a date as `yyyy-MM-dd HH:mm:ss` (UTC). Milliseconds are dropped. */
  static format(date: Date): string {
    return (
      `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
      ` ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    );
  }

  /**
   * The host's local wall-clock reading of `date`, carried in the same UTC
   * frame that parse() and format() use. Log files written by local clocks
   * compare correctly against this value.
   */
  static wallClock(date: Date = new Date()): Date {
    return new Date(date.getTime() - date.getTimezoneOffset() * 60_000);
  }

  /** Drops the sub-second part, matching the resolution of the log format. */
  static truncateToSeconds(date: Date): Date {
    return new Date(Math.floor(date.getTime() / 1000) * 1000);
  }
}
