import type { SrtDocument, SrtEntry, SrtStatistics } from "../types.js";
import { readFromFile } from "./file_utils.js";
import type { Logger } from "./logger.js";
import { formatSrtTiming, parseSrtTiming } from "./time_utils.js";

export class SrtDecodeError extends Error {
  constructor(
    message: string,
    readonly lineNumber: number
  ) {
    super(`Line ${lineNumber}: ${message}`);
    this.name = "SrtDecodeError";
  }
}

type DecodeState = "index" | "timing" | "text";

const INDEX_LINE = /^\d+$/;

/**
 * Decode SRT text line by line.
 *
 * Blank lines between blocks are tolerated and reported in the statistics,
 * as is a last block without its terminating blank line.
 * @throws SrtDecodeError on a bad index or timing line
 */
export function decodeSrt(content: string): SrtDocument {
  // Remove BOM if present
  const cleanContent =
    content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  const lines = cleanContent.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop(); // Trailing newline
  }

  const entries: SrtEntry[] = [];
  const stats: SrtStatistics = {
    consecutiveBlankLines: [],
    missingEndBlankLine: false,
  };

  let state: DecodeState = "index";
  let previousBlank = false;
  let current: SrtEntry | null = null;

  for (const [position, line] of lines.entries()) {
    const lineNumber = position + 1;
    const blank = line.trim().length === 0;

    switch (state) {
      case "index": {
        if (blank) {
          if (previousBlank) stats.consecutiveBlankLines.push(lineNumber);
          break;
        }
        const indexText = line.trim();
        if (!INDEX_LINE.test(indexText)) {
          throw new SrtDecodeError(
            `expected a subtitle index, found "${line}"`,
            lineNumber
          );
        }
        const index = Number.parseInt(indexText, 10);
        current = { index, timing: { startMs: 0, endMs: 0 }, lines: [] };
        state = "timing";
        break;
      }
      case "timing": {
        const timing = parseSrtTiming(line);
        if (timing === null || current === null) {
          throw new SrtDecodeError(
            `expected a timing line, found "${line}"`,
            lineNumber
          );
        }
        current.timing = timing;
        state = "text";
        break;
      }
      case "text": {
        if (current === null) break;
        if (blank) {
          entries.push(current);
          current = null;
          state = "index";
        } else {
          current.lines.push(line);
        }
        break;
      }
    }
    previousBlank = blank;
  }

  if (state === "timing") {
    throw new SrtDecodeError("file ends before a timing line", lines.length);
  }
  if (state === "text" && current !== null) {
    entries.push(current);
    stats.missingEndBlankLine = true;
  }

  return { entries, stats };
}

/** Encode entries as SRT text, one blank line after each block. */
export function encodeSrt(entries: SrtEntry[]): string {
  return entries
    .map(
      (entry) =>
        [String(entry.index), formatSrtTiming(entry.timing), ...entry.lines, ""]
          .join("\n") + "\n"
    )
    .join("");
}

/** Sort by start time, keeping the order of lines that start together. */
export function sortEntries(entries: SrtEntry[]): SrtEntry[] {
  return [...entries].sort((a, b) => a.timing.startMs - b.timing.startMs);
}

/** Renumber entries from 1 in their current order. */
export function renumberEntries(entries: SrtEntry[]): SrtEntry[] {
  return entries.map((entry, position) => ({ ...entry, index: position + 1 }));
}

/**
 * Pairs of (reported index, actual position) for entries whose index does
 * not match their 1-based position; gaps suggest missing lines.
 */
export function checkIndexMismatch(entries: SrtEntry[]): [number, number][] {
  const mismatches: [number, number][] = [];
  entries.forEach((entry, position) => {
    if (entry.index !== position + 1) {
      mismatches.push([entry.index, position + 1]);
    }
  });
  return mismatches;
}

/**
 * Read and decode an SRT file.
 * @returns The decoded document, or null after logging why it failed
 */
export async function loadSrtFile(
  filePath: string,
  logger: Logger
): Promise<SrtDocument | null> {
  logger.verbose(`Reading '${filePath}'`);
  const content = await readFromFile(filePath, logger);
  if (content === null) return null;

  try {
    const document = decodeSrt(content);
    logger.debug(
      `[SRT Parser] Parsed ${document.entries.length} subtitles from ${filePath}`
    );
    return document;
  } catch (error) {
    if (error instanceof SrtDecodeError) {
      logger.error(`Could not decode '${filePath}': ${error.message}`);
      return null;
    }
    throw error;
  }
}
