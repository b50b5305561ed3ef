/**
 * Time utilities for handling SRT timestamps and durations.
 * Every value is an integer number of milliseconds.
 */
import type { TimeRange } from "../types.js";

export const SECONDS = 1000;
export const MINUTES = 60 * SECONDS;
export const HOURS = 60 * MINUTES;

const TIMESTAMP_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})[,.](\d{1,3})$/;

/**
 * Converts milliseconds to a timestamp string in format HH:MM:SS,mmm
 * @param milliseconds Total milliseconds, negative values clamp to zero
 */
export function millisecondsToTimestamp(milliseconds: number): string {
  const total = Math.max(0, Math.round(milliseconds));
  const hours = Math.floor(total / HOURS);
  const minutes = Math.floor((total % HOURS) / MINUTES);
  const secs = Math.floor((total % MINUTES) / SECONDS);
  const ms = total % SECONDS;

  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")},${ms
    .toString()
    .padStart(3, "0")}`;
}

/**
 * Converts a timestamp string in format HH:MM:SS,mmm to milliseconds
 * @param timestamp Timestamp string (comma or period before the milliseconds)
 * @throws Error when the string is not a timestamp
 */
export function timestampToMilliseconds(timestamp: string): number {
  const match = TIMESTAMP_PATTERN.exec(timestamp.trim());
  if (!match) {
    throw new Error(`Invalid timestamp: "${timestamp}"`);
  }
  const [, hours, minutes, seconds, ms] = match;
  return (
    Number(hours) * HOURS +
    Number(minutes) * MINUTES +
    Number(seconds) * SECONDS +
    Number(ms.padEnd(3, "0"))
  );
}

/**
 * Parse SRT timestamp line (start --> end)
 * @param timingString SRT timing line (e.g., "00:01:23,456 --> 00:01:45,678")
 * @returns The range, or null if parsing fails
 */
export function parseSrtTiming(timingString: string): TimeRange | null {
  const parts = timingString.trim().split(/\s*-->\s*/);
  if (parts.length !== 2) {
    return null;
  }

  try {
    return {
      startMs: timestampToMilliseconds(parts[0]),
      endMs: timestampToMilliseconds(parts[1]),
    };
  } catch {
    return null;
  }
}

/**
 * Format a range to a SRT timing line
 * @returns SRT timing line (e.g., "00:01:23,456 --> 00:01:45,678")
 */
export function formatSrtTiming(range: TimeRange): string {
  return `${millisecondsToTimestamp(range.startMs)} --> ${millisecondsToTimestamp(
    range.endMs
  )}`;
}

/** Shifts both ends of a range by `milliseconds`. */
export function shiftRange(range: TimeRange, milliseconds: number): TimeRange {
  return {
    startMs: range.startMs + milliseconds,
    endMs: range.endMs + milliseconds,
  };
}
