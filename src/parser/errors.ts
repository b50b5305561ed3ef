/**
 * Structural failures of a parse. Every one of them aborts the parse.
 */
export type ParseErrorCode =
  | "UnknownFlag"
  | "PositionalUsedAsFlag"
  | "TooManyPositionals"
  | "MissingPositional"
  | "ConflictingFlags"
  | "MissingRequiredFlag"
  | "InvalidChoice"
  | "InvalidValue"
  | "InvalidSchema";

export class CommandLineArgumentError extends Error {
  readonly code: ParseErrorCode;

  constructor(code: ParseErrorCode, message: string) {
    super(message);
    this.name = "CommandLineArgumentError";
    this.code = code;
  }
}

/**
 * Throws a CommandLineArgumentError with `code` unless `condition` holds.
 */
export function parserAssert(
  condition: boolean,
  code: ParseErrorCode,
  message: string
): asserts condition {
  if (!condition) {
    throw new CommandLineArgumentError(code, message);
  }
}
