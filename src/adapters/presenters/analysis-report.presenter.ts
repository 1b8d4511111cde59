import { AnalysisReport } from "../../core/use-cases/analyze-log.use-case.js";
import { LogAnalyzer } from "../../core/domain/services/log-analyzer.service.js";

/** Console lines for an analysis run, in the order the CLI prints them. */
export function renderAnalysisReport(
  report: AnalysisReport,
  windowMinutes: number,
  analyzer: LogAnalyzer = new LogAnalyzer(),
): string[] {
  const out: string[] = [];

  out.push(`Log analysis: ${report.source}`);
  out.push("------------");
  out.push(`Lines read: ${report.totalLines}`);
  out.push(`Entries parsed: ${report.entries.length}`);
  if (report.rejected.length > 0) {
    out.push(`Malformed lines skipped: ${report.rejected.length}`);
    for (const r of report.rejected) out.push(`  ${r.message}`);
  }

  out.push("");
  out.push("Entries by level:");
  if (report.levelCounts.size === 0) out.push("  (none)");
  for (const [level, count] of report.levelCounts) {
    out.push(`  ${level}: ${count}`);
  }

  out.push("");
  out.push(`Recent errors (last ${windowMinutes} min):`);
  if (report.recentErrors.length === 0) out.push("  (none)");
  for (const e of report.recentErrors) out.push(`  ${analyzer.format(e)}`);

  out.push("");
  out.push(
    report.latestError
      ? `Latest error: ${analyzer.format(report.latestError)}`
      : "Latest error: (none)",
  );

  if (report.exportTarget !== undefined) {
    out.push("");
    out.push(
      `Exported ${report.exportedLines.length} ${report.exportLevel} entries to ${report.exportTarget}`,
    );
  }

  return out;
}
