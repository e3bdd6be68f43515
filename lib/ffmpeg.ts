import { spawn } from "child_process";
import { FFMPEG_PATH, FFPROBE_PATH, STDERR_TAIL_LINES } from "../src/config";
import { ExtractionError, ProbeError, describeError } from "../src/errors";
import { toFfmpegSeconds } from "../src/timestamp";
import type { ExtractionRequest, ProcessResult, TrackTags } from "./types";

export function runProcess(args: string[]): Promise<ProcessResult> {
  const [command, ...commandArgs] = args;
  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(command ?? "", commandArgs, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    child.on("error", (error) => reject(error));
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });
}

function tail(text: string, lines: number): string {
  return text.trimEnd().split(/\r?\n/).slice(-lines).join("\n");
}

export function buildMetadataArgs(tags: TrackTags): string[] {
  const args: string[] = ["-metadata", `title=${tags.title}`, "-metadata", `artist=${tags.artist}`];

  if (tags.album) {
    args.push("-metadata", `album=${tags.album}`);
  }

  if (tags.trackNumber && tags.trackNumber > 0) {
    args.push("-metadata", `track=${tags.trackNumber}`);
  }

  return args;
}

export function buildExtractionArgs(request: ExtractionRequest, withTags: boolean): string[] {
  const { segment, outputPath, tags } = request;
  const args = [
    FFMPEG_PATH,
    "-hide_banner",
    "-nostdin",
    "-y",
    "-ss",
    toFfmpegSeconds(segment.startMs),
    "-t",
    toFfmpegSeconds(segment.endMs - segment.startMs),
    "-i",
    segment.source,
    "-map",
    "0:a",
    "-c",
    "copy",
  ];

  if (withTags && tags) {
    args.push(...buildMetadataArgs(tags));
  }

  args.push(outputPath);
  return args;
}

/**
 * Stream-copies one segment into its own file. Containers that refuse the
 * metadata tags get a second attempt without them.
 */
export async function extractSegment(request: ExtractionRequest): Promise<void> {
  const { segment } = request;
  let result: ProcessResult;

  try {
    result = await runProcess(buildExtractionArgs(request, true));
    if (result.code !== 0 && request.tags) {
      console.warn(`⚠️ ffmpeg rejected tags for track #${segment.index + 1}, retrying without metadata`);
      result = await runProcess(buildExtractionArgs(request, false));
    }
  } catch (error) {
    throw new ExtractionError(segment.index, `Unable to run ffmpeg: ${describeError(error)}`, "", error);
  }

  if (result.code !== 0) {
    throw new ExtractionError(
      segment.index,
      `ffmpeg failed (${result.code ?? "unknown"}) on '${request.outputPath}'`,
      tail(result.stderr, STDERR_TAIL_LINES),
    );
  }
}

export async function probeDuration(filePath: string): Promise<number> {
  let result: ProcessResult;
  try {
    result = await runProcess([
      FFPROBE_PATH,
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "default=noprint_wrappers=1:nokey=1",
      filePath,
    ]);
  } catch (error) {
    throw new ProbeError(filePath, `unable to run ffprobe (${describeError(error)})`, error);
  }

  if (result.code !== 0) {
    throw new ProbeError(filePath, tail(result.stderr, STDERR_TAIL_LINES) || `ffprobe exited with ${result.code}`);
  }

  const seconds = Number.parseFloat(result.stdout.trim());
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ProbeError(filePath, `unexpected duration '${result.stdout.trim()}'`);
  }

  return Math.round(seconds * 1000);
}

export async function checkFfmpeg(): Promise<boolean> {
  for (const binary of [FFMPEG_PATH, FFPROBE_PATH]) {
    try {
      const result = await runProcess([binary, "-version"]);
      if (result.code !== 0) return false;
    } catch {
      return false;
    }
  }
  return true;
}
