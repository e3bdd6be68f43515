import { parseEntryLine, isSkippedLine } from "./entry";
import { EmptyTracklist, MalformedEntry } from "./errors";
import type { EntryParserOptions, RawEntry } from "./types";

const SOURCE_DIRECTIVE_RE = /^source\s*:\s*(.+)$/i;

function splitLines(text: string): string[] {
  return text.replace(/^\uFEFF/, "").split(/\r?\n/);
}

/**
 * Lazily parsed view over a timing file's text. Every iteration parses the
 * text again from the first line, so the sequence can be walked more than once.
 */
export class Tracklist implements Iterable<RawEntry> {
  readonly source: string | null;
  private readonly lines: string[];
  private readonly firstRecordLine: number;

  constructor(
    text: string,
    private readonly options: EntryParserOptions,
  ) {
    this.lines = splitLines(text);
    const header = this.readHeader();
    this.source = header.source;
    this.firstRecordLine = header.firstRecordLine;
  }

  private readHeader(): { source: string | null; firstRecordLine: number } {
    const marker = this.options.commentMarker;

    if (this.options.format === "pipe") {
      // The first real line of a pipe-format file names the audio file.
      for (let i = 0; i < this.lines.length; i++) {
        const line = this.lines[i] ?? "";
        if (isSkippedLine(line, marker)) continue;
        if (this.parsesAsRecord(line, i + 1)) {
          throw new MalformedEntry(i + 1, "expected the source audio file before the first track");
        }
        return { source: line.trim(), firstRecordLine: i + 1 };
      }
      return { source: null, firstRecordLine: this.lines.length };
    }

    for (const line of this.lines) {
      const trimmed = line.trim();
      if (!marker || !trimmed.startsWith(marker)) continue;
      const directive = trimmed.slice(marker.length).trim().match(SOURCE_DIRECTIVE_RE);
      if (directive?.[1]) {
        return { source: directive[1].trim(), firstRecordLine: 0 };
      }
    }
    return { source: null, firstRecordLine: 0 };
  }

  private parsesAsRecord(line: string, lineNumber: number): boolean {
    try {
      return parseEntryLine(line, lineNumber, this.options) !== null;
    } catch (error) {
      if (error instanceof MalformedEntry) return false;
      throw error;
    }
  }

  *[Symbol.iterator](): Iterator<RawEntry> {
    let count = 0;
    for (let i = this.firstRecordLine; i < this.lines.length; i++) {
      const entry = parseEntryLine(this.lines[i] ?? "", i + 1, this.options);
      if (!entry) continue;
      count++;
      yield entry;
    }

    if (count === 0) {
      throw new EmptyTracklist();
    }
  }

  toArray(): RawEntry[] {
    return [...this];
  }
}

export function loadTracklist(text: string, options: EntryParserOptions): Tracklist {
  const tracklist = new Tracklist(text, options);
  // Pulling the first record throws EmptyTracklist here rather than mid-plan.
  tracklist[Symbol.iterator]().next();
  return tracklist;
}
