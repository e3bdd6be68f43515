import type { Segment } from "../src/types";

export type TrackTags = {
  title: string;
  artist: string;
  album?: string;
  trackNumber?: number;
};

export type ExtractionRequest = {
  segment: Segment;
  outputPath: string;
  tags: TrackTags | null;
};

/** Cuts one segment out of its source. Rejects with an ExtractionError. */
export type Extractor = (request: ExtractionRequest) => Promise<void>;

/** Total length of an audio file, in milliseconds. */
export type DurationProbe = (path: string) => Promise<number>;

export type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};
