import { TimestampService } from "../../core/domain/services/timestamp.service.js";

/** Run identifier safe for file names, e.g. `run_20240101T090000_k3x9`. */
export function runId(now: Date = new Date()): string {
  const base = TimestampService.format(TimestampService.wallClock(now))
    .replace(/[-:]/g, "")
    .replace(" ", "T");
  const rand = Math.random().toString(36).slice(2, 6);
  return "run_" + base + "_" + rand;
}
