import { MalformedTimestamp } from "./errors";

// [[H:]MM:]SS or a bare count of seconds, with an optional decimal fraction.
const HOURS_RE = /^(\d+):(\d{2}):(\d{2})(?:\.(\d+))?$/;
const MINUTES_RE = /^(\d{1,2}):(\d{2})(?:\.(\d+))?$/;
const SECONDS_RE = /^(\d+)(?:\.(\d+))?$/;

function fractionToMs(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Math.round(Number(`0.${fraction}`) * 1000);
}

function checkSexagesimal(text: string, value: number, unit: string): void {
  if (value > 59) {
    throw new MalformedTimestamp(text, `${unit} must be between 00 and 59`);
  }
}

export function parseTimestamp(text: string): number {
  const value = text.trim();
  if (value.startsWith("-")) {
    throw new MalformedTimestamp(text, "negative values are not allowed");
  }

  const hoursMatch = value.match(HOURS_RE);
  if (hoursMatch) {
    const hours = Number(hoursMatch[1]);
    const minutes = Number(hoursMatch[2]);
    const seconds = Number(hoursMatch[3]);
    checkSexagesimal(text, minutes, "minutes");
    checkSexagesimal(text, seconds, "seconds");
    return (hours * 3600 + minutes * 60 + seconds) * 1000 + fractionToMs(hoursMatch[4]);
  }

  const minutesMatch = value.match(MINUTES_RE);
  if (minutesMatch) {
    const minutes = Number(minutesMatch[1]);
    const seconds = Number(minutesMatch[2]);
    checkSexagesimal(text, minutes, "minutes");
    checkSexagesimal(text, seconds, "seconds");
    return (minutes * 60 + seconds) * 1000 + fractionToMs(minutesMatch[3]);
  }

  const secondsMatch = value.match(SECONDS_RE);
  if (secondsMatch) {
    return Number(secondsMatch[1]) * 1000 + fractionToMs(secondsMatch[2]);
  }

  throw new MalformedTimestamp(text, "expected H:MM:SS, MM:SS or whole seconds");
}

export function isTimestamp(text: string): boolean {
  try {
    parseTimestamp(text);
    return true;
  } catch {
    return false;
  }
}

export function formatTimestamp(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const millis = ms - totalSeconds * 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const suffix = millis > 0 ? `.${String(millis).padStart(3, "0")}` : "";
  const ss = String(seconds).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${ss}${suffix}`;
  }

  return `${minutes}:${ss}${suffix}`;
}

/** Seconds with millisecond precision, the way ffmpeg takes `-ss` and `-t`. */
export function toFfmpegSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}
