export type EntryFormat = "line" | "pipe";

export type FailurePolicy = "abort" | "continue";

export type RawEntry = Readonly<{
  line: number;
  startMs: number;
  endMs?: number;
  title: string;
  artist: string;
}>;

export type Segment = Readonly<{
  index: number;
  startMs: number;
  endMs: number;
  title: string;
  artist: string;
  source: string;
}>;

export type EntryParserOptions = {
  format: EntryFormat;
  separator: string;
  commentMarker: string;
};

export type NamingOptions = {
  template: string;
  maxLength: number;
  album?: string;
  /** Extension without the dot; counted against the filename byte limit. */
  extension?: string;
};

export type PlannedSegment = {
  segment: Segment;
  filename: string;
  outputPath: string;
};

export type SplitPlan = {
  source: string;
  durationMs: number;
  outputDir: string;
  album: string;
  segments: PlannedSegment[];
};
