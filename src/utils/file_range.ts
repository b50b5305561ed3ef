import type { FileRange, LineRange, TimeWindow } from "../types.js";
import { timestampToMilliseconds } from "./time_utils.js";

/** A range string that is neither a line range nor a time range. */
export class FileRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileRangeError";
  }
}

export function isFileRange(value: unknown): value is FileRange {
  return (
    typeof value === "object" &&
    value !== null &&
    "filename" in value &&
    typeof value.filename === "string" &&
    "lineRange" in value &&
    "timeRange" in value
  );
}

/** A file with no range selected. */
export function wholeFile(filename: string): FileRange {
  return { filename, timeRange: null, lineRange: null };
}

const stripHash = (value: string): string =>
  value.startsWith("#") ? value.slice(1) : value;

function toLineRange(start: string, end: string): LineRange | null {
  const first = stripHash(start);
  const last = stripHash(end);
  const isStart = first.toLowerCase() === "start";
  const isEnd = last.toLowerCase() === "end";
  if ((!isStart && !/^\d+$/.test(first)) || (!isEnd && !/^\d+$/.test(last))) {
    return null;
  }
  return {
    start: isStart ? 0 : Number(first),
    end: isEnd ? null : Number(last),
  };
}

function toTimeWindow(start: string, end: string): TimeWindow | null {
  try {
    return {
      startMs:
        start.toLowerCase() === "start" ? 0 : timestampToMilliseconds(start),
      endMs: end.toLowerCase() === "end" ? null : timestampToMilliseconds(end),
    };
  } catch {
    return null;
  }
}

/**
 * Convert a command line string to a FileRange.
 *
 * `movie.srt` selects the whole file, `movie.srt:#10-#20` (or `10-20`) a
 * range of lines and `movie.srt:00:01:00,000-00:02:00,000` a range of time.
 * `start` and `end` may replace either bound.
 * @throws FileRangeError when the part after the first `:` is not a range
 */
export function parseFileRange(value: string): FileRange {
  const separator = value.indexOf(":");
  if (separator === -1) {
    return wholeFile(value);
  }

  const filename = value.slice(0, separator);
  const rangeString = value.slice(separator + 1);
  const bounds = rangeString.split("-");
  if (bounds.length !== 2) {
    throw new FileRangeError(
      `Range '${rangeString}' needs to be formatted as hh:mm:ss,mmm-hh:mm:ss,mmm or #n-#n`
    );
  }

  const [start, end] = bounds;
  const lineRange = toLineRange(start, end);
  if (lineRange !== null) {
    return { filename, timeRange: null, lineRange };
  }

  const timeRange = toTimeWindow(start, end);
  if (timeRange !== null) {
    return { filename, timeRange, lineRange: null };
  }

  throw new FileRangeError(`Unknown range: '${rangeString}'`);
}

/** Human readable form of the selected range, for log messages. */
export function describeRange(range: FileRange): string {
  if (range.lineRange) {
    const { start, end } = range.lineRange;
    return `lines ${start} to ${end ?? "end"}`;
  }
  if (range.timeRange) {
    const { startMs, endMs } = range.timeRange;
    return `${startMs}ms to ${endMs === null ? "end" : `${endMs}ms`}`;
  }
  return "all lines";
}
