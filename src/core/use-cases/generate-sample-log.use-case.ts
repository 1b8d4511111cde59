import { LogEntry } from "../domain/entities/log-entry.entity.js";
import { ILineSink } from "../domain/repositories/log-lines.repository.js";
import { LogAnalyzer } from "../domain/services/log-analyzer.service.js";
import { TimestampService } from "../domain/services/timestamp.service.js";

const MINUTE_MS = 60_000;

/** Offsets before "now" at which the sample application wrote each line. */
const SAMPLE_LINES: Array<{ agoMinutes: number; level: string; message: string }> = [
  { agoMinutes: 120, level: "INFO", message: "Application started" },
  { agoMinutes: 115, level: "DEBUG", message: "Loading configuration" },
  { agoMinutes: 60, level: "WARN", message: "Connection timeout, retrying" },
  { agoMinutes: 30, level: "ERROR", message: "Database connection failed" },
  { agoMinutes: 45, level: "INFO", message: "Processing user request" },
  { agoMinutes: 30, level: "ERROR", message: "Null pointer exception in module X" },
  { agoMinutes: 15, level: "INFO", message: "Request completed successfully" },
  { agoMinutes: 5, level: "DEBUG", message: "Cleaning up resources" },
];

export interface GenerateSampleLogRequest {
  target: string;
  now: Date;
}

export class GenerateSampleLogUseCase {
  constructor(
    private sink: ILineSink,
    private analyzer: LogAnalyzer = new LogAnalyzer(),
  ) {}

  buildEntries(now: Date): LogEntry[] {
    const base = TimestampService.truncateToSeconds(now).getTime();
    return SAMPLE_LINES.map((s) => ({
      timestamp: new Date(base - s.agoMinutes * MINUTE_MS),
      level: s.level,
      message: s.message,
    }));
  }

  async execute(request: GenerateSampleLogRequest): Promise<LogEntry[]> {
    const entries = this.buildEntries(request.now);
    await this.sink.writeLines(
      request.target,
      entries.map((e) => this.analyzer.format(e)),
    );
    return entries;
  }
}
