import path from "path";
import type { DurationProbe, Extractor, TrackTags } from "../lib/types";
import type { ExtractionRecord, SplitHistory } from "./db";
import { ExtractionError, SplitterError, UsageError, describeError } from "./errors";
import { buildOutputNames, defaultOutputDirectory, ensureDirectoryExists, fileExists } from "./filesystem";
import { planSegments } from "./planner";
import { formatTimestamp } from "./timestamp";
import { loadTracklist } from "./tracklist";
import type { EntryParserOptions, FailurePolicy, NamingOptions, PlannedSegment, SplitPlan } from "./types";

export type SplitRequest = {
  timingText: string;
  timingFile: string;
  /** Source given on the command line; wins over the one named in the timing file. */
  source: string | null;
  outputDir: string | null;
  extension: string | null;
  parser: EntryParserOptions;
  naming: NamingOptions;
};

export type PrepareDependencies = {
  acquire: (input: string) => Promise<string>;
  probeDuration: DurationProbe;
};

export type PlanResult =
  | { kind: "ready"; plan: SplitPlan }
  | { kind: "invalid"; error: SplitterError };

export type SegmentOutcome =
  | { kind: "extracted"; planned: PlannedSegment }
  | { kind: "skipped"; planned: PlannedSegment }
  | { kind: "failed"; planned: PlannedSegment; error: ExtractionError };

export type SplitReport = {
  total: number;
  outcomes: SegmentOutcome[];
  extracted: number;
  skipped: number;
  failed: number;
  aborted: boolean;
};

export type RunDependencies = {
  extract: Extractor;
  history?: SplitHistory | null;
};

export type RunOptions = {
  policy: FailurePolicy;
  resume: boolean;
  tags: boolean;
};

function resolveDeclaredSource(declared: string, timingFile: string): string {
  if (/^https?:\/\//i.test(declared) || path.isAbsolute(declared)) {
    return declared;
  }
  return path.join(path.dirname(timingFile), declared);
}

function resolveExtension(source: string, extension: string | null): string {
  const value = extension ?? path.extname(source);
  return value.replace(/^\./, "") || "mka";
}

/**
 * Loads, validates and names every segment. Nothing is written: an invalid
 * timing file comes back as `invalid` before any extraction can start.
 */
export async function prepareSplit(request: SplitRequest, deps: PrepareDependencies): Promise<PlanResult> {
  try {
    const tracklist = loadTracklist(request.timingText, request.parser);
    // Every line is parsed before the source is fetched or probed.
    const entries = tracklist.toArray();
    const declared = request.source ?? tracklist.source;
    if (!declared) {
      throw new UsageError("No source audio given and the timing file does not name one");
    }

    const input = request.source ? declared : resolveDeclaredSource(declared, request.timingFile);
    const source = await deps.acquire(input);
    const durationMs = await deps.probeDuration(source);
    const segments = planSegments(entries, durationMs, source);

    const album = request.naming.album ?? path.parse(source).name;
    const extension = resolveExtension(source, request.extension);
    const names = buildOutputNames(segments, { ...request.naming, album, extension });
    const outputDir = request.outputDir ?? defaultOutputDirectory(source);

    const planned = segments.map((segment, index) => {
      const filename = `${names[index] ?? `Track ${index + 1}`}.${extension}`;
      return { segment, filename, outputPath: path.join(outputDir, filename) };
    });

    return {
      kind: "ready",
      plan: { source, durationMs, outputDir, album, segments: planned },
    };
  } catch (error) {
    if (error instanceof SplitterError) {
      return { kind: "invalid", error };
    }
    throw error;
  }
}

export function describePlan(plan: SplitPlan): string[] {
  return plan.segments.map(({ segment, filename }) => {
    const number = String(segment.index + 1).padStart(2, "0");
    return `${number}. ${formatTimestamp(segment.startMs)} - ${formatTimestamp(segment.endMs)}  ${filename}`;
  });
}

function buildTags(plan: SplitPlan, planned: PlannedSegment): TrackTags {
  return {
    title: planned.segment.title,
    artist: planned.segment.artist,
    album: plan.album,
    trackNumber: planned.segment.index + 1,
  };
}

async function isAlreadyExtracted(
  history: SplitHistory,
  sourceKey: string,
  planned: PlannedSegment,
): Promise<boolean> {
  let record: ExtractionRecord | null;
  try {
    record = await history.getExtraction(sourceKey, planned.segment.index);
  } catch (error) {
    console.warn(`⚠️ Could not read split history, extracting anyway: ${describeError(error)}`);
    return false;
  }
  if (!record) return false;

  const unchanged =
    record.startMs === planned.segment.startMs &&
    record.endMs === planned.segment.endMs &&
    record.outputPath === planned.outputPath;

  return unchanged && (await fileExists(planned.outputPath));
}

async function recordExtraction(history: SplitHistory, record: ExtractionRecord): Promise<void> {
  try {
    await history.recordExtraction(record);
  } catch (error) {
    console.warn(`⚠️ Could not record extraction in split history: ${describeError(error)}`);
  }
}

/**
 * Extracts the planned segments one after another, in order. Under the
 * `abort` policy the first failure stops the run. History errors only warn.
 */
export async function runSplit(plan: SplitPlan, deps: RunDependencies, options: RunOptions): Promise<SplitReport> {
  const history = deps.history ?? null;
  const sourceKey = path.resolve(plan.source);
  const total = plan.segments.length;
  const report: SplitReport = { total, outcomes: [], extracted: 0, skipped: 0, failed: 0, aborted: false };

  await ensureDirectoryExists(plan.outputDir);

  for (const planned of plan.segments) {
    const { segment } = planned;
    console.log(`\n[${segment.index + 1}/${total}] ${segment.artist} - ${segment.title}`);

    if (options.resume && history && (await isAlreadyExtracted(history, sourceKey, planned))) {
      console.log("⏭ Already extracted, skipping");
      report.outcomes.push({ kind: "skipped", planned });
      report.skipped++;
      continue;
    }

    try {
      await deps.extract({
        segment,
        outputPath: planned.outputPath,
        tags: options.tags ? buildTags(plan, planned) : null,
      });
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(segment.index, describeError(error), "", error);
      console.error(`✗ ${failure.message}`);
      if (failure.stderr) {
        console.error(failure.stderr);
      }
      report.outcomes.push({ kind: "failed", planned, error: failure });
      report.failed++;

      if (options.policy === "abort") {
        report.aborted = true;
        break;
      }
      continue;
    }

    console.log(`✓ Saved: ${planned.outputPath}`);
    report.outcomes.push({ kind: "extracted", planned });
    report.extracted++;

    if (history) {
      await recordExtraction(history, {
        sourceKey,
        segmentIndex: segment.index,
        startMs: segment.startMs,
        endMs: segment.endMs,
        title: segment.title,
        artist: segment.artist,
        outputPath: planned.outputPath,
        extractedAt: new Date().toISOString(),
      });
    }
  }

  return report;
}

export function printSummary(report: SplitReport): void {
  console.log("\n=== Summary ===");
  console.log(`Total: ${report.total}`);
  console.log(`Extracted: ${report.extracted}`);
  console.log(`Skipped: ${report.skipped}`);
  console.log(`Failed: ${report.failed}`);
  if (report.aborted) {
    console.log(`Not attempted: ${report.total - report.outcomes.length}`);
  }
}
