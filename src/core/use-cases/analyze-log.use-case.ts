import {
  ERROR_LEVEL,
  LogEntry,
  MalformedLinePolicy,
} from "../domain/entities/log-entry.entity.js";
import { FormatError } from "../domain/errors.js";
import {
  ILineSink,
  ILineSource,
} from "../domain/repositories/log-lines.repository.js";
import { ILogger } from "../domain/services/ILogger.js";
import {
  byLevel,
  LogAnalyzer,
} from "../domain/services/log-analyzer.service.js";

export interface AnalyzeLogRequest {
  source: string;
  /** When set, the exported lines are written here. */
  exportTarget?: string;
  now: Date;
  windowMs: number;
  exportLevel: string;
  onMalformed?: MalformedLinePolicy;
}

export interface AnalysisReport {
  source: string;
  totalLines: number;
  entries: LogEntry[];
  levelCounts: Map<string, number>;
  recentErrors: LogEntry[];
  latestError?: LogEntry;
  exportLevel: string;
  exportedLines: string[];
  exportTarget?: string;
  rejected: FormatError[];
}

export class AnalyzeLogUseCase {
  constructor(
    private source: ILineSource,
    private sink: ILineSink,
    private logger: ILogger,
    private analyzer: LogAnalyzer = new LogAnalyzer(),
  ) {}

  async execute(request: AnalyzeLogRequest): Promise<AnalysisReport> {
    this.logger.log({
      level: "info",
      event: "analysis_started",
      source: request.source,
      windowMs: request.windowMs,
      onMalformed: request.onMalformed ?? "abort",
    });

    try {
      return await this.run(request);
    } catch (err) {
      this.logger.log({
        level: "error",
        event: "analysis_failed",
        source: request.source,
        message: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  private async run(request: AnalyzeLogRequest): Promise<AnalysisReport> {
    const lines: string[] = [];
    for await (const line of this.source.readLines(request.source)) {
      lines.push(line);
    }

    const parsed = this.analyzer.parseLines(lines, {
      onMalformed: request.onMalformed,
    });

    for (const rejected of parsed.rejected) {
      this.logger.log({
        level: "warn",
        event: "malformed_line_skipped",
        source: request.source,
        lineNumber: rejected.lineNumber,
        message: rejected.message,
      });
    }

    const { entries } = parsed;
    const exportedLines = this.analyzer.exportFiltered(
      entries,
      byLevel(request.exportLevel),
    );

    if (request.exportTarget !== undefined) {
      await this.sink.writeLines(request.exportTarget, exportedLines);
      this.logger.log({
        level: "info",
        event: "export_written",
        target: request.exportTarget,
        lines: exportedLines.length,
      });
    }

    const report: AnalysisReport = {
      source: request.source,
      totalLines: lines.length,
      entries,
      levelCounts: this.analyzer.countByLevel(entries),
      recentErrors: this.analyzer.recentErrors(
        entries,
        request.now,
        request.windowMs,
      ),
      latestError: this.analyzer.findLatest(entries, ERROR_LEVEL),
      exportLevel: request.exportLevel,
      exportedLines,
      exportTarget: request.exportTarget,
      rejected: parsed.rejected,
    };

    this.logger.log({
      level: "info",
      event: "analysis_completed",
      source: request.source,
      entries: entries.length,
      rejected: parsed.rejected.length,
      recentErrors: report.recentErrors.length,
    });

    return report;
  }
}
