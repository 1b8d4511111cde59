import { createWriteStream, mkdirSync, existsSync, WriteStream } from "node:fs";
import { join } from "node:path";
import { AppLogEvent, ILogger } from "../../core/domain/services/ILogger.js";

/**
 * Writes one JSON object per line to `<logDir>/<name>_<runId>.jsonl`.
 * Events logged before init() or after close() are dropped. A stream error
 * is reported on stderr and disables the logger for the rest of the run.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private logPath: string | null = null;

  constructor(
    private logDir: string,
    private logNameTemplate: string,
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    const filename =
      this.logNameTemplate.replace(/\.[^.]+$/, "") + `_${runId}.jsonl`;
    this.logPath = join(this.logDir, filename);
    const path = this.logPath;
    const stream = createWriteStream(path, { flags: "a" });
    stream.on("error", (err) => {
      console.error(`[JsonLogger] Failed to write ${path}: ${err.message}`);
      if (this.logStream === stream) this.logStream = null;
    });
    this.logStream = stream;
  }

  log(event: AppLogEvent): void {
    if (this.logStream?.writable) {
      const full = { timestamp: new Date().toISOString(), ...event };
      this.logStream.write(JSON.stringify(full) + "\n");
    }
  }

  getLogPath(): string | null {
    return this.logPath;
  }

  /** Flushes pending writes. Resolves once the file handle is released. */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream || stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      stream.once("close", () => resolve());
      stream.end();
    });
  }
}
