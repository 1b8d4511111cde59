import { describe, it, expect } from "vitest";
import { renderAnalysisReport } from "../src/adapters/presenters/analysis-report.presenter.js";
import { AnalyzeLogUseCase } from "../src/core/use-cases/analyze-log.use-case.js";
import { InMemoryLineStore } from "./support/in-memory-line-store.js";
import { RecordingLogger } from "./support/recording-logger.js";

async function analyze(lines: string[], exportTarget?: string) {
  const store = new InMemoryLineStore();
  store.setFile("app.log", lines);
  return new AnalyzeLogUseCase(store, store, new RecordingLogger()).execute({
    source: "app.log",
    exportTarget,
    now: new Date("2024-01-01T09:11:00Z"),
    windowMs: 10 * 60_000,
    exportLevel: "ERROR",
    onMalformed: "skip",
  });
}

describe("renderAnalysisReport", () => {
  it("renders counts, recent errors and the export summary", async () => {
    const report = await analyze(
      [
        "2024-01-01 09:00:00 [INFO] boot",
        "bad line",
        "2024-01-01 09:05:00 [ERROR] disk full",
      ],
      "errors-only.log",
    );

    expect(renderAnalysisReport(report, 10)).toEqual([
      "Log analysis: app.log",
      "------------",
      "Lines read: 3",
      "Entries parsed: 2",
      "Malformed lines skipped: 1",
      "  Line 2: Invalid log format: bad line",
      "",
      "Entries by level:",
      "  INFO: 1",
      "  ERROR: 1",
      "",
      "Recent errors (last 10 min):",
      "  2024-01-01 09:05:00 [ERROR] disk full",
      "",
      "Latest error: 2024-01-01 09:05:00 [ERROR] disk full",
      "",
      "Exported 1 ERROR entries to errors-only.log",
    ]);
  });

  it("renders placeholders for an empty log", async () => {
    const report = await analyze([]);

    expect(renderAnalysisReport(report, 60)).toEqual([
      "Log analysis: app.log",
      "------------",
      "Lines read: 0",
      "Entries parsed: 0",
      "",
      "Entries by level:",
      "  (none)",
      "",
      "Recent errors (last 60 min):",
      "  (none)",
      "",
      "Latest error: (none)",
    ]);
  });
});
