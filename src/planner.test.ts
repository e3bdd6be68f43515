import { describe, expect, it } from "vitest";
import { StartOutOfRange, UnorderedEntries } from "./errors";
import { planSegments } from "./planner";
import type { RawEntry } from "./types";

function entries(...starts: number[]): RawEntry[] {
  return starts.map((startMs, index) => ({
    line: index + 1,
    startMs,
    title: `Title ${index + 1}`,
    artist: `Artist ${index + 1}`,
  }));
}

function planError(list: RawEntry[], total: number): unknown {
  try {
    planSegments(list, total, "mix.mp3");
  } catch (error) {
    return error;
  }
  return null;
}

describe("planSegments", () => {
  it("ends each segment where the next begins and the last at the source end", () => {
    const segments = planSegments(entries(0, 90000, 240000), 360000, "mix.mp3");
    expect(segments.map((segment) => [segment.startMs, segment.endMs])).toEqual([
      [0, 90000],
      [90000, 240000],
      [240000, 360000],
    ]);
  });

  it("numbers segments from zero and carries names and source through", () => {
    const segments = planSegments(entries(0, 60000), 120000, "/music/mix.mp3");
    expect(segments[1]).toEqual({
      index: 1,
      startMs: 60000,
      endMs: 120000,
      title: "Title 2",
      artist: "Artist 2",
      source: "/music/mix.mp3",
    });
  });

  it("accepts a first entry that starts after zero", () => {
    const segments = planSegments(entries(5000, 65000), 100000, "mix.mp3");
    expect(segments[0]?.startMs).toBe(5000);
  });

  it("rejects decreasing starts at the offending index", () => {
    const error = planError(entries(10000, 5000), 360000);
    expect(error).toBeInstanceOf(UnorderedEntries);
    expect(error instanceof UnorderedEntries && error.index).toBe(1);
  });

  it("rejects repeated starts", () => {
    const error = planError(entries(0, 30000, 30000, 90000), 360000);
    expect(error instanceof UnorderedEntries && error.index).toBe(2);
  });

  it("rejects a start equal to the source duration", () => {
    const error = planError(entries(0, 360000), 360000);
    expect(error).toBeInstanceOf(StartOutOfRange);
    expect(error instanceof StartOutOfRange && error.index).toBe(1);
  });

  it("rejects a single entry past the end of the source", () => {
    const error = planError(entries(400000), 360000);
    expect(error instanceof StartOutOfRange && error.index).toBe(0);
  });

  it("uses an explicit end time when it stays inside the boundary", () => {
    const list: RawEntry[] = [
      { line: 1, startMs: 0, endMs: 60000, title: "Intro", artist: "DJ" },
      { line: 2, startMs: 90000, title: "Song", artist: "Band" },
    ];
    const segments = planSegments(list, 360000, "mix.mp3");
    expect(segments.map((segment) => [segment.startMs, segment.endMs])).toEqual([
      [0, 60000],
      [90000, 360000],
    ]);
  });

  it("rejects an explicit end that overlaps the next entry", () => {
    const list: RawEntry[] = [
      { line: 1, startMs: 0, endMs: 120000, title: "Intro", artist: "DJ" },
      { line: 2, startMs: 90000, title: "Song", artist: "Band" },
    ];
    const error = planError(list, 360000);
    expect(error instanceof StartOutOfRange && error.index).toBe(0);
  });

  it("rejects an explicit end past the source", () => {
    const list: RawEntry[] = [{ line: 1, startMs: 0, endMs: 400000, title: "Only", artist: "DJ" }];
    expect(planError(list, 360000)).toBeInstanceOf(StartOutOfRange);
  });

  it("covers the source without gaps or overlaps for increasing starts", () => {
    const total = 3600000;
    for (const count of [1, 2, 7, 25]) {
      const step = Math.floor(total / (count + 1));
      const starts = Array.from({ length: count }, (_, index) => index * step + (index % 3) * 1000);
      const segments = planSegments(entries(...starts), total, "mix.mp3");

      expect(segments).toHaveLength(count);
      expect(segments[0]?.startMs).toBe(starts[0]);
      expect(segments[count - 1]?.endMs).toBe(total);
      segments.forEach((segment, index) => {
        expect(segment.endMs).toBeGreaterThan(segment.startMs);
        const next = segments[index + 1];
        if (next) {
          expect(segment.endMs).toBe(next.startMs);
        }
      });
    }
  });
});
