import { MalformedEntry, MalformedTimestamp } from "./errors";
import { parseTimestamp } from "./timestamp";
import type { EntryParserOptions, RawEntry } from "./types";

function stripTimestampBrackets(token: string): string {
  const match = token.match(/^[[(](.*)[\])]$/);
  return match?.[1] ?? token;
}

export function isSkippedLine(line: string, commentMarker: string): boolean {
  const trimmed = line.trim();
  return !trimmed || (commentMarker !== "" && trimmed.startsWith(commentMarker));
}

function parseStart(lineNumber: number, text: string): number {
  try {
    return parseTimestamp(stripTimestampBrackets(text));
  } catch (error) {
    if (error instanceof MalformedTimestamp) {
      throw new MalformedEntry(lineNumber, error.message, error);
    }
    throw error;
  }
}

function requireField(lineNumber: number, value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) {
    throw new MalformedEntry(lineNumber, `missing ${field}`);
  }
  return trimmed;
}

function parseLineRecord(lineNumber: number, text: string, separator: string): RawEntry {
  const match = text.match(/^(\S+)\s+(.*)$/);
  if (!match) {
    throw new MalformedEntry(lineNumber, `expected '<timestamp> <artist>${separator}<title>'`);
  }

  const startMs = parseStart(lineNumber, match[1] ?? "");
  const rest = match[2] ?? "";
  const separatorIndex = rest.indexOf(separator);
  if (separatorIndex === -1) {
    throw new MalformedEntry(lineNumber, `missing '${separator}' between artist and title`);
  }

  const artist = requireField(lineNumber, rest.slice(0, separatorIndex), "artist");
  const title = requireField(lineNumber, rest.slice(separatorIndex + separator.length), "title");
  return { line: lineNumber, startMs, title, artist };
}

function parsePipeRecord(lineNumber: number, text: string): RawEntry {
  const parts = text.split("|");
  if (parts.length < 3) {
    throw new MalformedEntry(lineNumber, "expected 'start[|end]|title|artist'");
  }

  const startMs = parseStart(lineNumber, parts[0] ?? "");

  let endMs: number | undefined;
  let nameIndex = 1;
  try {
    endMs = parseTimestamp(parts[1] ?? "");
    nameIndex = 2;
  } catch (error) {
    if (!(error instanceof MalformedTimestamp)) throw error;
  }

  const title = requireField(lineNumber, parts[nameIndex], "title");
  const artist = requireField(lineNumber, parts.slice(nameIndex + 1).join("|"), "artist");

  if (endMs !== undefined) {
    if (endMs <= startMs) {
      throw new MalformedEntry(lineNumber, "end time must be after the start time");
    }
    return { line: lineNumber, startMs, endMs, title, artist };
  }

  return { line: lineNumber, startMs, title, artist };
}

/**
 * Parses one timing file line. Returns null for blank and comment lines.
 */
export function parseEntryLine(line: string, lineNumber: number, options: EntryParserOptions): RawEntry | null {
  if (isSkippedLine(line, options.commentMarker)) {
    return null;
  }

  const text = line.trim();
  if (options.format === "pipe") {
    return parsePipeRecord(lineNumber, text);
  }
  return parseLineRecord(lineNumber, text, options.separator);
}
