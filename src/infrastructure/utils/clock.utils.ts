import { TimestampService } from "../../core/domain/services/timestamp.service.js";

/**
 * Reference time for an analysis. An explicit `--now` value is taken as
 * written; otherwise the host's local wall clock is used, in the frame log
 * timestamps are parsed into.
 */
export function resolveNow(raw?: string, clock: Date = new Date()): Date {
  if (raw === undefined) return TimestampService.wallClock(clock);
  const now = TimestampService.parse(raw);
  if (!now) {
    throw new Error(`--now must match YYYY-MM-DD HH:MM:SS, got "${raw}"`);
  }
  return now;
}
