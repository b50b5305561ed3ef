import type { GroupSpec, PipelineContext } from "../types.js";
import type { ConsoleLogLevel } from "../utils/logger.js";
import type { ArgMap } from "./arg_map.js";

export const VERBOSITY_KEY = "verbosity";

/** Determine the console log level from the printing flags. */
export function verbosityFromFlags(args: ArgMap): ConsoleLogLevel {
  if (args.getBoolean("quiet")) return "silent";
  if (args.getBoolean("debug")) return "debug";
  if (args.getBoolean("verbose")) return "verbose";
  return "info";
}

export function applyVerbosity(args: ArgMap, context: PipelineContext): void {
  const level = verbosityFromFlags(args);
  args.set(VERBOSITY_KEY, level);
  context.logger.configure({ consoleLogLevel: level });
}

/**
 * Flags every invocation accepts for controlling terminal output.
 */
export function printFlagsGroup(): GroupSpec {
  return {
    members: [
      {
        name: "-verbose",
        shorthand: "-V",
        help: "Enable verbose feedback",
        kind: "enable",
      },
      {
        name: "-debug",
        help: "Enable debug feedback",
        kind: "enable",
      },
      {
        name: "-quiet",
        shorthand: "-q",
        help: "Print no output; use this if you batch commands",
        kind: "enable",
      },
    ],
    mutuallyExclusive: false,
    postProcessors: [applyVerbosity],
  };
}
