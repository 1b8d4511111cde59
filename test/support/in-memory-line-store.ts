import {
  ILineSink,
  ILineSource,
} from "../../src/core/domain/repositories/log-lines.repository.js";

/** Line source and sink backed by a Map, for use-case tests. */
export class InMemoryLineStore implements ILineSource, ILineSink {
  private files = new Map<string, string[]>();

  async *readLines(location: string): AsyncIterable<string> {
    const lines = this.files.get(location);
    if (lines === undefined) {
      throw new Error(`File not found: ${location}`);
    }
    for (const line of lines) yield line;
  }

  async writeLines(location: string, lines: readonly string[]): Promise<void> {
    this.files.set(location, [...lines]);
  }

  /** Set a file directly (convenience for test setup). */
  setFile(location: string, lines: string[]): void {
    this.files.set(location, [...lines]);
  }

  getFile(location: string): string[] | undefined {
    return this.files.get(location);
  }
}
