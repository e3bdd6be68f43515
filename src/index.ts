#!/usr/bin/env node
import { readFile } from "fs/promises";
import { checkFfmpeg, extractSegment, probeDuration } from "../lib/ffmpeg";
import { acquireSource } from "./acquire";
import { USAGE, parseArgs, toNamingOptions, toParserOptions, type CliOptions } from "./args";
import { DATABASE_URL, DOWNLOADS_FOLDER } from "./config";
import { PostgresSplitHistory, type SplitHistory } from "./db";
import { UsageError, describeError } from "./errors";
import { describePlan, prepareSplit, printSummary, runSplit } from "./split";
import { formatTimestamp } from "./timestamp";

function readOptions(): CliOptions | null {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`✗ ${error.message}\n`);
      console.error(USAGE);
      process.exitCode = 2;
      return null;
    }
    throw error;
  }
}

/**
 * Plans and splits one timing file. Returns false when the file could not be
 * read, failed validation, or had a segment fail.
 */
async function processTimingFile(
  timingFile: string,
  options: CliOptions,
  history: SplitHistory | null,
): Promise<boolean> {
  console.log(`Reading timing file: ${timingFile}`);
  let timingText: string;
  try {
    timingText = await readFile(timingFile, "utf8");
  } catch (error) {
    console.error(`✗ Unable to read '${timingFile}': ${describeError(error)}`);
    return false;
  }

  const result = await prepareSplit(
    {
      timingText,
      timingFile,
      source: options.source,
      outputDir: options.outputDir,
      extension: options.extension,
      parser: toParserOptions(options),
      naming: toNamingOptions(options),
    },
    {
      acquire: (input) => acquireSource(input, DOWNLOADS_FOLDER),
      probeDuration,
    },
  );

  if (result.kind === "invalid") {
    console.error(`✗ ${timingFile}: ${result.error.message}`);
    return false;
  }

  const { plan } = result;
  console.log(`Source: ${plan.source} (${formatTimestamp(plan.durationMs)})`);
  console.log(`Found ${plan.segments.length} tracks, writing to ${plan.outputDir}`);

  if (options.dryRun) {
    for (const line of describePlan(plan)) {
      console.log(line);
    }
    return true;
  }

  const report = await runSplit(
    plan,
    { extract: extractSegment, history },
    { policy: options.policy, resume: options.resume, tags: options.tags },
  );
  printSummary(report);
  return report.failed === 0;
}

async function main() {
  try {
    const options = readOptions();
    if (!options) return;

    if (options.help) {
      console.log(USAGE);
      return;
    }

    if (!(await checkFfmpeg())) {
      console.error("ffmpeg and ffprobe need to be installed and reachable on the PATH");
      process.exitCode = 1;
      return;
    }

    const history = !options.dryRun && DATABASE_URL ? new PostgresSplitHistory(DATABASE_URL) : null;
    if (options.resume && !DATABASE_URL) {
      console.warn("⚠️ --resume needs DATABASE_URL; every track will be extracted");
    }

    let failedFiles = 0;
    try {
      for (const timingFile of options.timingFiles) {
        if (!(await processTimingFile(timingFile, options, history))) {
          failedFiles++;
        }
      }
    } finally {
      await history?.close();
    }

    if (options.timingFiles.length > 1) {
      console.log(`\nTiming files: ${options.timingFiles.length - failedFiles} ok, ${failedFiles} failed`);
    }
    if (failedFiles > 0) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error("Error:", describeError(error));
    process.exitCode = 1;
  }
}

void main();
