// Common types shared across the argument parser and the subcommands
import type { ArgMap } from "./parser/arg_map.js";
import type { Logger } from "./utils/logger.js";

// How a parameter consumes tokens
export type ParameterKind =
  | "value" // exactly one value
  | "enable" // boolean switch, true when present
  | "disable" // boolean switch, false when present
  | "optional" // at most one value, may be left out
  | "multiple"; // one or more values

// Anything a parameter can resolve to. Lists are arrays; decoded
// collaborator values (file ranges, time ranges) are plain objects.
export type ArgValue = string | number | boolean | object | null;

// Converts one raw token; throws when the token is not acceptable
export type ValueConverter = (raw: string) => ArgValue;

export interface ParameterSpec {
  name: string; // "-unit" is a flag, "input" is a positional
  shorthand?: string; // e.g. "-u"
  help: string;
  displayName?: string; // Name shown in usage lines instead of `name`
  kind: ParameterKind;
  choices?: readonly string[];
  valueType?: ValueConverter; // Defaults to keeping the raw string
  default?: string; // Raw form, converted through valueType
}

export interface GroupSpec {
  members: ParameterSpec[];
  mutuallyExclusive: boolean;
  required?: boolean; // At least one member must be supplied
  validators?: Validator[];
  postProcessors?: PostProcessor[];
}

/** Explicit logging context handed to every pipeline callback. */
export interface PipelineContext {
  programName: string;
  logger: Logger;
}

export type Validator = (args: ArgMap, context: PipelineContext) => boolean;
export type PostProcessor = (args: ArgMap, context: PipelineContext) => void;
export type CommandHandler = (
  args: ArgMap,
  context: PipelineContext
) => Promise<boolean>;

export interface CommandSpec {
  name: string;
  help: string;
  handler?: CommandHandler;
  parameters: (ParameterSpec | GroupSpec)[];
  validators?: Validator[];
  postProcessors?: PostProcessor[];
}

export type SchemaEntry = CommandSpec | GroupSpec | ParameterSpec;

// Outcome of one parse
export type ParseResult =
  | { status: "parsed"; args: ArgMap; command: CommandSpec | null }
  | { status: "help"; text: string }
  | { status: "rejected" }; // A validator stopped the pipeline and reported why

// Decoded subtitle timing, in milliseconds
export interface TimeRange {
  startMs: number;
  endMs: number;
}

// Line range selected on the command line; `end: null` means "to the end"
export interface LineRange {
  start: number;
  end: number | null;
}

// Time window selected on the command line; `endMs: null` means "to the end"
export interface TimeWindow {
  startMs: number;
  endMs: number | null;
}

// Command line representation of a range of lines in a subtitle file
export interface FileRange {
  filename: string;
  timeRange: TimeWindow | null;
  lineRange: LineRange | null;
}

// One subtitle block of an SRT file
export interface SrtEntry {
  index: number;
  timing: TimeRange;
  lines: string[];
}

// Oddities noticed while decoding, reported by `display`
export interface SrtStatistics {
  consecutiveBlankLines: number[]; // 1-based line numbers
  missingEndBlankLine: boolean;
}

export interface SrtDocument {
  entries: SrtEntry[];
  stats: SrtStatistics;
}
