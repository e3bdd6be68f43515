import { rename, unlink, writeFile } from "fs/promises";
import path from "path";
import { SourceNotFound } from "./errors";
import { ensureDirectoryExists, fileExists, sanitizeFilename } from "./filesystem";

export function isRemoteSource(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

export function buildDownloadPath(url: string, downloadsFolder: string): string {
  const { pathname } = new URL(url);
  const basename = sanitizeFilename(decodeURIComponent(path.posix.basename(pathname)));
  return path.join(downloadsFolder, basename || "source");
}

/**
 * Resolves the audio source to a local file, downloading http(s) URLs into
 * `downloadsFolder`. A file already downloaded there is reused.
 */
export async function acquireSource(input: string, downloadsFolder: string): Promise<string> {
  if (!isRemoteSource(input)) {
    if (!(await fileExists(input))) {
      throw new SourceNotFound(input);
    }
    return input;
  }

  const target = buildDownloadPath(input, downloadsFolder);
  if (await fileExists(target)) {
    console.log(`⏭ Using previously downloaded source: ${target}`);
    return target;
  }

  console.log(`Downloading: ${input}`);
  const response = await fetch(input);
  if (!response.ok) {
    throw new SourceNotFound(input, `download failed: ${response.status} ${response.statusText}`);
  }

  await ensureDirectoryExists(downloadsFolder);
  const tempPath = `${target}.part`;
  try {
    const buffer = await response.arrayBuffer();
    await writeFile(tempPath, Buffer.from(buffer));
    await rename(tempPath, target);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }

  console.log(`Saved: ${target}`);
  return target;
}
