import { StartOutOfRange, UnorderedEntries } from "./errors";
import { formatTimestamp } from "./timestamp";
import type { RawEntry, Segment } from "./types";

function describeEntry(entry: RawEntry, index: number): string {
  return `entry #${index} (line ${entry.line}, ${formatTimestamp(entry.startMs)})`;
}

/**
 * Turns timing entries into contiguous segments. Entries keep their file order:
 * each one must start strictly after the previous, and every start must fall
 * before the end of the source. A segment runs until the next entry's start,
 * the last one until the end of the source, unless the entry gives its own end.
 */
export function planSegments(entries: Iterable<RawEntry>, totalDurationMs: number, source: string): Segment[] {
  const list = [...entries];
  const total = formatTimestamp(totalDurationMs);

  for (let i = 1; i < list.length; i++) {
    const previous = list[i - 1];
    const current = list[i];
    if (!previous || !current) continue;
    if (current.startMs <= previous.startMs) {
      throw new UnorderedEntries(
        i,
        `${describeEntry(current, i)} does not start after ${describeEntry(previous, i - 1)}`,
      );
    }
  }

  const first = list[0];
  if (first && (first.startMs < 0 || first.startMs >= totalDurationMs)) {
    throw new StartOutOfRange(0, `${describeEntry(first, 0)} starts outside the source (${total})`);
  }

  const lastIndex = list.length - 1;
  const last = list[lastIndex];
  if (last && last.startMs >= totalDurationMs) {
    throw new StartOutOfRange(
      lastIndex,
      `${describeEntry(last, lastIndex)} starts at or after the end of the source (${total})`,
    );
  }

  return list.map((entry, index) => {
    const boundary = list[index + 1]?.startMs ?? totalDurationMs;
    let endMs = boundary;

    if (entry.endMs !== undefined) {
      if (entry.endMs <= entry.startMs || entry.endMs > boundary) {
        throw new StartOutOfRange(
          index,
          `${describeEntry(entry, index)} ends at ${formatTimestamp(entry.endMs)}, past the next boundary ${formatTimestamp(boundary)}`,
        );
      }
      endMs = entry.endMs;
    }

    if (endMs <= entry.startMs) {
      throw new Error(`Segment ${index} has no duration`);
    }

    return {
      index,
      startMs: entry.startMs,
      endMs,
      title: entry.title,
      artist: entry.artist,
      source,
    };
  });
}
