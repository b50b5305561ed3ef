import type {
  FileRange,
  GroupSpec,
  LineRange,
  PipelineContext,
  SrtEntry,
  TimeWindow,
} from "../types.js";
import type { ArgMap } from "../parser/arg_map.js";
import { STDIO_SENTINEL } from "../parser/command_parser.js";
import {
  FileRangeError,
  isFileRange,
  parseFileRange,
  wholeFile,
} from "../utils/file_range.js";
import { writeToFile } from "../utils/file_utils.js";
import { encodeSrt } from "../utils/srt_utils.js";

export const SRT_EXTENSION = ".srt";

type EntryFilter = (entry: SrtEntry) => boolean;

export function inLineRange({ start, end }: LineRange): EntryFilter {
  if (end === null) {
    return (entry) => start <= entry.index;
  }
  return (entry) => start <= entry.index && entry.index < end;
}

export function inTimeWindow({ startMs, endMs }: TimeWindow): EntryFilter {
  if (endMs === null) {
    return (entry) => startMs <= entry.timing.startMs;
  }
  return (entry) =>
    startMs <= entry.timing.startMs && entry.timing.startMs < endMs;
}

/** Selects the entries covered by the range; everything when it has none. */
export function fileRangeFilter(range: FileRange): EntryFilter {
  if (range.lineRange) return inLineRange(range.lineRange);
  if (range.timeRange) return inTimeWindow(range.timeRange);
  return () => true;
}

/** The single `input` argument, after post-processing. */
export function inputRange(args: ArgMap): FileRange {
  return args.get("input", isFileRange, "a file range");
}

function toFileRange(raw: string, useRanges: boolean): FileRange {
  return useRanges ? parseFileRange(raw) : wholeFile(raw);
}

function checkSrtFilename(
  range: FileRange,
  context: PipelineContext
): boolean {
  if (range.filename.endsWith(SRT_EXTENSION)) return true;
  context.logger.error(`'${range.filename}' is not an srt file`);
  if (range.filename.includes(":")) {
    context.logger.warn(
      "If you specified a range, use -R to enable range parsing"
    );
  }
  return false;
}

// Ranges are decoded here, once the -use-ranges switch is known. A range
// that fails to decode is reported and left as a string for the validator.
export function parsePromisedFileRange(
  args: ArgMap,
  context: PipelineContext
): void {
  const raw = args.getString("input");
  try {
    args.set("input", toFileRange(raw, args.getBoolean("use-ranges")));
  } catch (error) {
    if (!(error instanceof FileRangeError)) throw error;
    context.logger.error(`Could not read range of '${raw}': ${error.message}`);
  }
}

export function parseManyPromisedFileRanges(
  args: ArgMap,
  context: PipelineContext
): void {
  const useRanges = args.getBoolean("use-ranges");
  const raws = args.getStrings("input");
  try {
    args.set(
      "input",
      raws.map((raw) => toFileRange(raw, useRanges))
    );
  } catch (error) {
    if (!(error instanceof FileRangeError)) throw error;
    context.logger.error(`Could not read input ranges: ${error.message}`);
  }
}

export function validateInputFiletype(
  args: ArgMap,
  context: PipelineContext
): boolean {
  const input = args.peek("input");
  // Decoding failed and was already reported
  if (!isFileRange(input)) return false;
  return checkSrtFilename(input, context);
}

export function validateManyInputFiletypes(
  args: ArgMap,
  context: PipelineContext
): boolean {
  const inputs = args.peek("input");
  if (!Array.isArray(inputs)) return false;
  for (const input of inputs) {
    if (!isFileRange(input)) return false;
    if (!checkSrtFilename(input, context)) return false;
  }
  return true;
}

const useRangesFlag = {
  name: "-use-ranges",
  shorthand: "-R",
  help: "Enable parsing for ranges of lines or timestamps",
  kind: "enable",
} as const;

/** One SRT input file, optionally with a range when -R is given. */
export function singleSrtInputParams(): GroupSpec {
  return {
    members: [
      { name: "input", help: "The input file", kind: "value" },
      { ...useRangesFlag },
    ],
    mutuallyExclusive: false,
    validators: [validateInputFiletype],
    postProcessors: [parsePromisedFileRange],
  };
}

export function multipleSrtInputParams(): GroupSpec {
  return {
    members: [
      { name: "input", help: "Input files for command", kind: "multiple" },
      { ...useRangesFlag },
    ],
    mutuallyExclusive: false,
    validators: [validateManyInputFiletypes],
    postProcessors: [parseManyPromisedFileRanges],
  };
}

// Subtitles written to stdout must not be interleaved with progress lines
export function keepStdoutForOutput(
  args: ArgMap,
  context: PipelineContext
): void {
  if (args.getOptionalString("output") === STDIO_SENTINEL) {
    context.logger.configure({ consoleStream: "stderr" });
  }
}

/** Either an output file (`-` for stdout) or overwriting the input. */
export function srtOutputParams(): GroupSpec {
  return {
    members: [
      {
        name: "-output",
        shorthand: "-o",
        help: "The output file, - for standard output",
        displayName: "output_file",
        kind: "value",
      },
      {
        name: "-overwrite",
        shorthand: "-O",
        help: "Overwrite input file",
        kind: "enable",
      },
    ],
    mutuallyExclusive: true,
    required: true,
    postProcessors: [keepStdoutForOutput],
  };
}

/**
 * Writes the entries where the output flags say.
 * @param sourceFile The input file, replaced when -overwrite is set
 * @returns True if the file was written
 */
export async function saveSubtitleFile(
  entries: SrtEntry[],
  sourceFile: string,
  args: ArgMap,
  context: PipelineContext
): Promise<boolean> {
  const { logger } = context;
  const content = encodeSrt(entries);

  let filename: string;
  if (args.getBoolean("overwrite")) {
    filename = sourceFile;
    logger.info(`Overwriting '${filename}' with ${entries.length} lines`);
  } else {
    filename = args.getString("output");
    if (filename === STDIO_SENTINEL) {
      process.stdout.write(content);
      return true;
    }
    logger.info(`Writing ${entries.length} lines to '${filename}'`);
  }

  if (await writeToFile(filename, content, logger)) {
    logger.success("Finished!");
    return true;
  }
  logger.error(`Fatal error: could not save file '${filename}'`);
  return false;
}
