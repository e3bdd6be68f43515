import { describe, expect, it } from "vitest";
import { parseEntryLine } from "./entry";
import { MalformedEntry, MalformedTimestamp } from "./errors";
import type { EntryParserOptions } from "./types";

const lineOptions: EntryParserOptions = { format: "line", separator: " - ", commentMarker: "#" };
const pipeOptions: EntryParserOptions = { format: "pipe", separator: " - ", commentMarker: "#" };

function parseError(line: string, lineNumber: number, options: EntryParserOptions): unknown {
  try {
    parseEntryLine(line, lineNumber, options);
  } catch (error) {
    return error;
  }
  return null;
}

describe("parseEntryLine (line format)", () => {
  it("parses timestamp, artist and title", () => {
    expect(parseEntryLine("0:00 Artist One - First Song", 1, lineOptions)).toEqual({
      line: 1,
      startMs: 0,
      artist: "Artist One",
      title: "First Song",
    });
  });

  it("splits at the first separator and accepts bracketed timestamps", () => {
    expect(parseEntryLine("  [01:30]  A -  B - C  ", 4, lineOptions)).toEqual({
      line: 4,
      startMs: 90000,
      artist: "A",
      title: "B - C",
    });
    expect(parseEntryLine("(1:00:00) Band - Closer", 9, lineOptions)?.startMs).toBe(3600000);
  });

  it("honours a custom separator", () => {
    const options = { ...lineOptions, separator: " / " };
    expect(parseEntryLine("2:00 Band / Song - Live", 2, options)).toEqual({
      line: 2,
      startMs: 120000,
      artist: "Band",
      title: "Song - Live",
    });
  });

  it("skips blank and comment lines", () => {
    expect(parseEntryLine("", 1, lineOptions)).toBeNull();
    expect(parseEntryLine("   \t", 2, lineOptions)).toBeNull();
    expect(parseEntryLine("# 0:00 Not - A track", 3, lineOptions)).toBeNull();
    expect(parseEntryLine("   # indented comment", 4, lineOptions)).toBeNull();
  });

  it("rejects a line without the separator", () => {
    const error = parseError("1:30 No separator here", 3, lineOptions);
    expect(error).toBeInstanceOf(MalformedEntry);
    expect(error instanceof MalformedEntry && error.line).toBe(3);
  });

  it("rejects a line with only a timestamp", () => {
    expect(parseError("1:30", 5, lineOptions)).toBeInstanceOf(MalformedEntry);
  });

  it("wraps a bad timestamp with its line number", () => {
    const error = parseError("xx:yy Artist - Title", 7, lineOptions);
    expect(error).toBeInstanceOf(MalformedEntry);
    expect(error instanceof MalformedEntry && error.line).toBe(7);
    expect(error instanceof MalformedEntry && error.cause).toBeInstanceOf(MalformedTimestamp);
  });

  it("rejects an empty artist", () => {
    const options = { ...lineOptions, separator: "|" };
    const error = parseError("0:10 |Title", 2, options);
    expect(error).toBeInstanceOf(MalformedEntry);
    expect(error instanceof MalformedEntry && error.message).toBe("Line 2: missing artist");
  });
});

describe("parseEntryLine (pipe format)", () => {
  it("reads an explicit end time", () => {
    expect(parseEntryLine("0:00|3:00|Song|Band", 2, pipeOptions)).toEqual({
      line: 2,
      startMs: 0,
      endMs: 180000,
      title: "Song",
      artist: "Band",
    });
  });

  it("treats the second field as the title when it is not a time", () => {
    expect(parseEntryLine("1:00|Song|Band", 3, pipeOptions)).toEqual({
      line: 3,
      startMs: 60000,
      title: "Song",
      artist: "Band",
    });
  });

  it("rejects an end before the start", () => {
    const error = parseError("2:00|1:00|Song|Band", 4, pipeOptions);
    expect(error instanceof MalformedEntry && error.message).toBe("Line 4: end time must be after the start time");
  });

  it("requires a title and an artist", () => {
    expect(parseError("0:00|Song", 5, pipeOptions)).toBeInstanceOf(MalformedEntry);
    expect(parseError("0:00||Band", 6, pipeOptions)).toBeInstanceOf(MalformedEntry);
    const error = parseError("0:00|Song| ", 7, pipeOptions);
    expect(error instanceof MalformedEntry && error.message).toBe("Line 7: missing artist");
  });
});
