export type SplitterErrorCode =
  | "MALFORMED_TIMESTAMP"
  | "MALFORMED_ENTRY"
  | "EMPTY_TRACKLIST"
  | "UNORDERED_ENTRIES"
  | "START_OUT_OF_RANGE"
  | "EXTRACTION_FAILED"
  | "PROBE_FAILED"
  | "SOURCE_NOT_FOUND"
  | "USAGE";

export class SplitterError extends Error {
  readonly code: SplitterErrorCode;

  constructor(code: SplitterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedTimestamp extends SplitterError {
  readonly text: string;

  constructor(text: string, reason: string) {
    super("MALFORMED_TIMESTAMP", `Invalid timestamp '${text}': ${reason}`);
    this.text = text;
  }
}

/**
 * A timing file record that could not be parsed. `line` is 1-based.
 */
export class MalformedEntry extends SplitterError {
  readonly line: number;

  constructor(line: number, reason: string, cause?: unknown) {
    super("MALFORMED_ENTRY", `Line ${line}: ${reason}`, { cause });
    this.line = line;
  }
}

export class EmptyTracklist extends SplitterError {
  constructor() {
    super("EMPTY_TRACKLIST", "Timing file has no track entries");
  }
}

export class UnorderedEntries extends SplitterError {
  readonly index: number;

  constructor(index: number, message: string) {
    super("UNORDERED_ENTRIES", message);
    this.index = index;
  }
}

export class StartOutOfRange extends SplitterError {
  readonly index: number;

  constructor(index: number, message: string) {
    super("START_OUT_OF_RANGE", message);
    this.index = index;
  }
}

export class ExtractionError extends SplitterError {
  readonly segmentIndex: number;
  readonly stderr: string;

  constructor(segmentIndex: number, message: string, stderr = "", cause?: unknown) {
    super("EXTRACTION_FAILED", message, { cause });
    this.segmentIndex = segmentIndex;
    this.stderr = stderr;
  }
}

export class ProbeError extends SplitterError {
  constructor(path: string, reason: string, cause?: unknown) {
    super("PROBE_FAILED", `Unable to read duration of '${path}': ${reason}`, { cause });
  }
}

export class SourceNotFound extends SplitterError {
  constructor(source: string, reason = "file does not exist") {
    super("SOURCE_NOT_FOUND", `Source '${source}' unavailable: ${reason}`);
  }
}

export class UsageError extends SplitterError {
  constructor(message: string) {
    super("USAGE", message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
