// Public surface of the command line parsing engine
export { ArgMap, ArgumentAccessError, SUBCOMMAND_KEY } from "./arg_map.js";
export {
  ArgumentPool,
  canonicalName,
  isPositional,
  type PooledGroup,
} from "./argument_pool.js";
export {
  CommandParser,
  HELP_TOKENS,
  STDIO_SENTINEL,
  classifyToken,
  type ParserOptions,
  type TokenClass,
} from "./command_parser.js";
export {
  CommandLineArgumentError,
  parserAssert,
  type ParseErrorCode,
} from "./errors.js";
export { renderCommandHelp, renderGeneralHelp } from "./help.js";
export { PipelineRunner } from "./pipeline.js";
export { VERBOSITY_KEY, printFlagsGroup } from "./print_flags.js";
export { coerce, resolveArguments } from "./resolution.js";
export { decimal, integer, isNumericLiteral, text } from "./value_types.js";
