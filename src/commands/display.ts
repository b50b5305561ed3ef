import type { CommandSpec, FileRange, PipelineContext } from "../types.js";
import type { ArgMap } from "../parser/arg_map.js";
import { isFileRange } from "../utils/file_range.js";
import {
  checkIndexMismatch,
  loadSrtFile,
  sortEntries,
} from "../utils/srt_utils.js";
import { multipleSrtInputParams } from "./common.js";

async function displayOne(
  range: FileRange,
  long: boolean,
  context: PipelineContext
): Promise<boolean> {
  const { logger } = context;
  if (range.lineRange !== null || range.timeRange !== null) {
    logger.warn(`Ignoring provided range for ${range.filename}...`);
  }

  const document = await loadSrtFile(range.filename, logger);
  if (document === null) return false;

  const entries = sortEntries(document.entries);
  const { stats } = document;
  logger.info(`srt subtitles: ${range.filename}`);
  logger.info(`  contains ${entries.length} lines`);

  let hasIssues = false;

  if (stats.consecutiveBlankLines.length > 0) {
    hasIssues = true;
    logger.info(
      `  ${stats.consecutiveBlankLines.length} cases of consecutive blank lines`
    );
    if (long) {
      logger.info(
        `  on line numbers: ${stats.consecutiveBlankLines.join(", ")}`
      );
    }
  }

  if (stats.missingEndBlankLine) {
    hasIssues = true;
    logger.warn("  missing terminating blank line");
  }

  const mismatches = checkIndexMismatch(entries);
  if (mismatches.length > 0) {
    hasIssues = true;
    logger.warn(`  ${mismatches.length} cases of mismatched line indices`);
    logger.warn("  this might suggest missing lines");
    if (long) {
      logger.info("Reported line number\tActual line number");
      for (const [reported, actual] of mismatches) {
        logger.info(`${reported}\t${actual}`);
      }
    }
  }

  if (!hasIssues) {
    logger.info("  no issues");
  }
  return true;
}

/** Report line counts and file issues for every input. */
export async function display(
  args: ArgMap,
  context: PipelineContext
): Promise<boolean> {
  const inputs = args.getList("input", isFileRange, "a file range");
  const long = args.getBoolean("long");
  if (inputs.length > 1) {
    context.logger.info(`Displaying information for ${inputs.length} files`);
  }

  let allRead = true;
  for (const input of inputs) {
    if (!(await displayOne(input, long, context))) {
      allRead = false;
    }
    context.logger.info("");
  }
  return allRead;
}

export const displayCommand: CommandSpec = {
  name: "display",
  help: "Display information about subtitle file",
  handler: display,
  parameters: [
    {
      name: "-long",
      help: "Display detailed information",
      kind: "enable",
    },
    multipleSrtInputParams(),
  ],
};
