import type { CommandSpec, PipelineContext, SrtEntry } from "../types.js";
import type { ArgMap } from "../parser/arg_map.js";
import { integer } from "../parser/value_types.js";
import { loadSrtFile, sortEntries } from "../utils/srt_utils.js";
import {
  inputRange,
  saveSubtitleFile,
  singleSrtInputParams,
  srtOutputParams,
} from "./common.js";

/**
 * Lengthens every line by `extendMs`, stopping `gapMs` short of the next
 * line. Lines already closer than `gapMs` to the next one are left alone,
 * as is the last line.
 */
export function extendEntries(
  entries: SrtEntry[],
  extendMs: number,
  gapMs: number
): SrtEntry[] {
  return entries.map((entry, position) => {
    const next = entries[position + 1];
    if (next === undefined) return entry;

    const difference = next.timing.startMs - entry.timing.endMs;
    if (difference < gapMs) return entry;

    const endMs =
      difference <= extendMs
        ? next.timing.startMs - gapMs
        : entry.timing.endMs + extendMs;
    return { ...entry, timing: { ...entry.timing, endMs } };
  });
}

export async function extend(
  args: ArgMap,
  context: PipelineContext
): Promise<boolean> {
  const { logger } = context;
  logger.warn(
    "The extend subcommand is experimental so remember to have backups"
  );

  const input = inputRange(args);
  const document = await loadSrtFile(input.filename, logger);
  if (document === null) return false;

  const extended = extendEntries(
    sortEntries(document.entries),
    args.getNumber("extend"),
    args.getNumber("gap")
  );
  return saveSubtitleFile(extended, input.filename, args, context);
}

export const extendCommand: CommandSpec = {
  name: "extend",
  help: "Extend subtitle duration",
  handler: extend,
  parameters: [
    srtOutputParams(),
    singleSrtInputParams(),
    {
      name: "extend",
      displayName: "extend_by",
      help: "Amount of milliseconds to extend by",
      kind: "value",
      valueType: integer,
    },
    {
      name: "gap",
      displayName: "threshold",
      help: "Threshold between subtitle lines",
      kind: "optional",
      valueType: integer,
      default: "100",
    },
  ],
};
