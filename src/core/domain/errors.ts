/**
 * Raised when a line does not have the `<timestamp> [<level>] <message>` shape
 * or its timestamp does not parse. Carries the offending content so callers
 * can report it.
 */
export class FormatError extends Error {
  constructor(
    public readonly line: string,
    public readonly reason: string,
    public readonly lineNumber?: number,
  ) {
    super(
      lineNumber === undefined
        ? `${reason}: ${line}`
        : `Line ${lineNumber}: ${reason}: ${line}`,
    );
    this.name = "FormatError";
  }

  /** Same error, tagged with the 1-based position of the line in its batch. */
  atLine(lineNumber: number): FormatError {
    return new FormatError(this.line, this.reason, lineNumber);
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
