import { createReadStream, existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createInterface } from "node:readline";
import {
  ILineSink,
  ILineSource,
} from "../../core/domain/repositories/log-lines.repository.js";

/** Local-disk line source and sink. Handles are opened and closed per call. */
export class FileLineRepository implements ILineSource, ILineSink {
  async *readLines(location: string): AsyncIterable<string> {
    if (!existsSync(location)) throw new Error(`File not found: ${location}`);
    const stream = createReadStream(location, { encoding: "utf-8" });
    const rl = createInterface({ input: stream, crlfDelay: Infinity });
    try {
      for await (const line of rl) {
        yield line;
      }
    } finally {
      rl.close();
      stream.destroy();
    }
  }

  async writeLines(location: string, lines: readonly string[]): Promise<void> {
    const dir = dirname(location);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const content = lines.map((l) => l + "\n").join("");
    writeFileSync(location, content, { encoding: "utf-8", flag: "w" });
  }
}
