import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { TimestampService } from "../src/core/domain/services/timestamp.service.js";
import { LogAnalyzer } from "../src/core/domain/services/log-analyzer.service.js";
import { resolveNow } from "../src/infrastructure/utils/clock.utils.js";
import { runId } from "../src/infrastructure/utils/id.utils.js";

const INSTANT = new Date("2024-01-01T00:00:00Z");

describe("local wall clock", () => {
  let savedTz: string | undefined;

  beforeEach(() => {
    savedTz = process.env.TZ;
  });

  afterEach(() => {
    if (savedTz === undefined) delete process.env.TZ;
    else process.env.TZ = savedTz;
  });

  it("reads the host clock east of UTC", () => {
    process.env.TZ = "Asia/Tokyo";
    expect(TimestampService.format(TimestampService.wallClock(INSTANT))).toBe(
      "2024-01-01 09:00:00",
    );
  });

  it("reads the host clock west of UTC", () => {
    process.env.TZ = "America/New_York";
    expect(TimestampService.format(TimestampService.wallClock(INSTANT))).toBe(
      "2023-12-31 19:00:00",
    );
  });

  it("defaults the analysis reference time to the local wall clock", () => {
    process.env.TZ = "Asia/Tokyo";
    expect(resolveNow(undefined, INSTANT)).toEqual(new Date("2024-01-01T09:00:00Z"));
  });

  it("takes an explicit --now value as written, whatever the host zone", () => {
    process.env.TZ = "America/New_York";
    expect(resolveNow("2024-06-01 12:00:00", INSTANT)).toEqual(
      new Date("2024-06-01T12:00:00Z"),
    );
  });

  it("rejects a malformed --now value", () => {
    expect(() => resolveNow("2024-06-01T12:00:00")).toThrow(
      '--now must match YYYY-MM-DD HH:MM:SS, got "2024-06-01T12:00:00"',
    );
  });

  it("finds recent errors in a log written by a local clock", () => {
    process.env.TZ = "Asia/Tokyo";
    const analyzer = new LogAnalyzer();
    const { entries } = analyzer.parseLines([
      "2024-01-01 07:30:00 [ERROR] Disk full",
      "2024-01-01 08:30:00 [ERROR] Database connection failed",
      "2024-01-01 08:45:00 [INFO] Request completed",
    ]);

    const recent = analyzer.recentErrors(entries, resolveNow(undefined, INSTANT), 60 * 60_000);

    expect(recent.map((e) => e.message)).toEqual(["Database connection failed"]);
  });

  it("stamps run ids with the local wall clock", () => {
    process.env.TZ = "Asia/Tokyo";
    expect(runId(INSTANT)).toMatch(/^run_20240101T090000_[a-z0-9]*$/);
  });
});
