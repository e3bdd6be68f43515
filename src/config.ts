export const FFMPEG_PATH = process.env.FFMPEG_PATH ?? "ffmpeg";
export const FFPROBE_PATH = process.env.FFPROBE_PATH ?? "ffprobe";
export const DOWNLOADS_FOLDER = process.env.DOWNLOADS_FOLDER ?? "downloads";
export const DATABASE_URL = process.env.DATABASE_URL?.trim() || null;
export const COMMENT_MARKER = process.env.COMMENT_MARKER ?? "#";
export const DEFAULT_SEPARATOR = process.env.ENTRY_SEPARATOR ?? " - ";
export const DEFAULT_NAME_TEMPLATE = process.env.NAME_TEMPLATE ?? "{{artist}} - {{title}}";

const envMaxFilenameLength = Number(process.env.MAX_FILENAME_LENGTH ?? "");
export const MAX_FILENAME_LENGTH =
  Number.isFinite(envMaxFilenameLength) && envMaxFilenameLength >= 16 ? envMaxFilenameLength : 180;

// Most filesystems cap one path component at 255 bytes.
export const MAX_FILENAME_BYTES = 255;

// Trailing lines of ffmpeg stderr kept on an ExtractionError.
const envStderrLines = Number(process.env.STDERR_TAIL_LINES ?? "");
export const STDERR_TAIL_LINES = Number.isFinite(envStderrLines) && envStderrLines > 0 ? envStderrLines : 20;
