/**
 * Segregated interfaces: where log lines come from and where exported lines go.
 * Implementations own the underlying handles; the analyzer only sees lines.
 */
export interface ILineSource {
  /** Lines in file order, without terminators. A final newline adds no empty line. */
  readLines(location: string): AsyncIterable<string>;
}

export interface ILineSink {
  /** Replaces `location` with the given lines, each terminated by "\n". */
  writeLines(location: string, lines: readonly string[]): Promise<void>;
}
