import type { CommandSpec, FileRange, PipelineContext } from "../types.js";
import type { ArgMap } from "../parser/arg_map.js";
import {
  FileRangeError,
  describeRange,
  isFileRange,
  parseFileRange,
} from "../utils/file_range.js";
import {
  loadSrtFile,
  renumberEntries,
  sortEntries,
} from "../utils/srt_utils.js";
import {
  fileRangeFilter,
  inputRange,
  saveSubtitleFile,
  singleSrtInputParams,
  srtOutputParams,
} from "./common.js";

/** Decode the `range` positional, which carries no filename of its own. */
export function parseTrimRange(args: ArgMap, context: PipelineContext): void {
  const raw = args.getOptionalString("range");
  if (raw === undefined) return;
  try {
    args.set("range", parseFileRange(`:${raw}`));
  } catch (error) {
    if (!(error instanceof FileRangeError)) throw error;
    context.logger.error(`Could not read range '${raw}': ${error.message}`);
  }
}

export function validateNoRangeConflict(
  args: ArgMap,
  context: PipelineContext
): boolean {
  if (!args.has("range")) return true;
  if (!isFileRange(args.peek("range"))) return false;
  if (args.getBoolean("use-ranges")) {
    context.logger.error("Cannot have conflicting ranges");
    return false;
  }
  return true;
}

/** Keep the lines in range and renumber them from 1. */
export async function trim(
  args: ArgMap,
  context: PipelineContext
): Promise<boolean> {
  const { logger } = context;
  const input = inputRange(args);

  let selected: FileRange = input;
  if (args.has("range")) {
    selected = {
      ...args.get("range", isFileRange, "a file range"),
      filename: input.filename,
    };
    logger.info(`Using provided range: ${describeRange(selected)}`);
  }

  const document = await loadSrtFile(input.filename, logger);
  if (document === null) return false;

  const inRange = fileRangeFilter(selected);
  const trimmed = renumberEntries(
    sortEntries(document.entries).filter(inRange)
  );
  return saveSubtitleFile(trimmed, input.filename, args, context);
}

export const trimCommand: CommandSpec = {
  name: "trim",
  help: "Trim to specified range of lines or timestamps",
  handler: trim,
  parameters: [
    srtOutputParams(),
    singleSrtInputParams(),
    {
      name: "range",
      help: "A range of lines or timestamps",
      kind: "optional",
    },
  ],
  validators: [validateNoRangeConflict],
  postProcessors: [parseTrimRange],
};
