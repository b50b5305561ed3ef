import type { ArgValue, CommandSpec, PipelineContext } from "../types.js";
import type { ArgMap } from "../parser/arg_map.js";
import { integer } from "../parser/value_types.js";
import { loadSrtFile, sortEntries } from "../utils/srt_utils.js";
import { MINUTES, SECONDS, shiftRange } from "../utils/time_utils.js";
import {
  fileRangeFilter,
  inputRange,
  saveSubtitleFile,
  singleSrtInputParams,
  srtOutputParams,
} from "./common.js";

// Milliseconds per unit accepted by -unit
export const DELAY_UNITS = {
  millisecond: 1,
  second: SECONDS,
  minute: MINUTES,
  ms: 1,
  s: SECONDS,
} as const;

export type DelayUnit = keyof typeof DELAY_UNITS;

function isDelayUnit(value: ArgValue): value is DelayUnit {
  return typeof value === "string" && Object.hasOwn(DELAY_UNITS, value);
}

/** Shift the lines in the input range by the requested amount. */
export async function delay(
  args: ArgMap,
  context: PipelineContext
): Promise<boolean> {
  const { logger } = context;
  const input = inputRange(args);
  const document = await loadSrtFile(input.filename, logger);
  if (document === null) return false;

  const unit = args.get("unit", isDelayUnit, "a delay unit");
  const amount = args.getNumber("delay") * DELAY_UNITS[unit];
  const exclusive = args.getBoolean("exclusive");
  const inRange = fileRangeFilter(input);

  const entries = sortEntries(document.entries);
  let modified = 0;
  const delayed = entries.flatMap((entry) => {
    if (!inRange(entry)) {
      return exclusive ? [] : [entry];
    }
    modified++;
    return [{ ...entry, timing: shiftRange(entry.timing, amount) }];
  });

  logger.info(`Modified ${modified} of ${entries.length} lines`);
  return saveSubtitleFile(delayed, input.filename, args, context);
}

export const delayCommand: CommandSpec = {
  name: "delay",
  help: "Delay a range of subtitles by a specified amount",
  handler: delay,
  parameters: [
    srtOutputParams(),
    {
      name: "-unit",
      shorthand: "-u",
      help: "Specify unit of delay",
      kind: "value",
      choices: Object.keys(DELAY_UNITS),
      default: "ms",
    },
    {
      name: "-exclusive",
      shorthand: "-x",
      help: "Encode only the specified range",
      kind: "enable",
    },
    singleSrtInputParams(),
    {
      name: "delay",
      displayName: "delay_by",
      help: "Amount of units (see -u) to delay by",
      kind: "value",
      valueType: integer,
    },
  ],
};
