/** Invalid topology, missing inputs, or bad environment settings. Fatal before processing. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A noise line that does not decode into a flow record. */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly line: string,
    public readonly lineNumber?: number,
  ) {
    super(lineNumber === undefined ? message : `line ${lineNumber}: ${message}`);
    this.name = "ParseError";
  }

  atLine(lineNumber: number): ParseError {
    return new ParseError(this.message, this.line, lineNumber);
  }
}

/** Output directory or sink problems. */
export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
