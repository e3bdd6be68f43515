import { access, constants, mkdir } from "fs/promises";
import path from "path";
import { MAX_FILENAME_BYTES } from "./config";
import { UsageError } from "./errors";
import type { NamingOptions, Segment } from "./types";

const ALLOWED_TEMPLATE_TOKENS = new Set(["artist", "title", "index", "trackNumber", "album"]);
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])(\..*)?$/i;

const TEMPLATE_TOKEN_RE = /{{\s*([^{}]*?)\s*}}/g;

export function validateTemplate(template: string): void {
  if (!template.trim()) {
    throw new UsageError("Name template cannot be empty.");
  }

  const leftover = template.replace(TEMPLATE_TOKEN_RE, "");
  if (leftover.includes("{{") || leftover.includes("}}")) {
    throw new UsageError("Name template has unmatched {{ }} braces.");
  }

  const invalidTokens = [...template.matchAll(TEMPLATE_TOKEN_RE)]
    .map((match) => match[1] ?? "")
    .filter((token) => !ALLOWED_TEMPLATE_TOKENS.has(token));
  if (invalidTokens.length > 0) {
    throw new UsageError(`Unsupported template tokens: ${invalidTokens.map((token) => `{{${token}}}`).join(", ")}`);
  }
}

function renderTemplate(template: string, context: Record<string, string>): string {
  return template.replace(/{{\s*([a-zA-Z0-9_]+)\s*}}/g, (_, token: string) => context[token] ?? "");
}

export function sanitizeFilename(filename: string): string {
  const cleaned = filename
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/[<>:"/\\|?*]/g, "_")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^[. ]+|[. ]+$/g, "");

  return RESERVED_NAMES.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Cuts at code point boundaries so a surrogate pair is never split, then
 * drops characters until the UTF-8 encoding fits in `maxBytes`.
 */
function truncate(name: string, maxLength: number, maxBytes: number): string {
  const chars = Array.from(name);
  const kept = chars.slice(0, maxLength);
  while (kept.length > 0 && Buffer.byteLength(kept.join(""), "utf8") > maxBytes) {
    kept.pop();
  }
  if (kept.length === chars.length) {
    return name;
  }
  return kept.join("").replace(/[. ]+$/, "");
}

function formatTrackNumber(index: number, total: number): string {
  const width = Math.max(2, String(total).length);
  return String(index + 1).padStart(width, "0");
}

/**
 * Derives one filename (without extension) per segment. Names are compared
 * case-insensitively; a repeat gets the segment's 1-based position appended.
 * With `options.extension` set, the full filename stays within the byte
 * limit most filesystems put on a single path component.
 */
export function buildOutputNames(segments: readonly Segment[], options: NamingOptions): string[] {
  const taken = new Set<string>();
  const extensionBytes = options.extension ? Buffer.byteLength(`.${options.extension}`, "utf8") : 0;
  const maxBytes = MAX_FILENAME_BYTES - extensionBytes;

  return segments.map((segment) => {
    const trackNumber = formatTrackNumber(segment.index, segments.length);
    const rendered = renderTemplate(options.template, {
      artist: segment.artist,
      title: segment.title,
      index: String(segment.index + 1),
      trackNumber,
      album: options.album ?? "",
    });
    const base = sanitizeFilename(rendered) || `Track ${trackNumber}`;

    let name = truncate(base, options.maxLength, maxBytes);
    let counter = segment.index + 1;
    while (taken.has(name.toLowerCase())) {
      const suffix = ` (${counter})`;
      name = `${truncate(base, options.maxLength - suffix.length, maxBytes - suffix.length)}${suffix}`;
      counter++;
    }

    taken.add(name.toLowerCase());
    return name;
  });
}

/**
 * The original tool's layout: `music/mix.mp3` is split into `music/mix/`.
 */
export function defaultOutputDirectory(source: string): string {
  const parsed = path.parse(source);
  return path.join(parsed.dir, parsed.name);
}

export async function ensureDirectoryExists(directory: string): Promise<void> {
  await mkdir(directory, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}
