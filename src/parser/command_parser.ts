import type { ChalkInstance } from "chalk";
import type {
  CommandSpec,
  ParameterSpec,
  ParseResult,
  PipelineContext,
} from "../types.js";
import { PROGRAM_DESCRIPTION, PROGRAM_NAME } from "../config/defaults.js";
import type { ArgMap } from "./arg_map.js";
import {
  ArgumentPool,
  FLAG_MARKER,
  MULTI_VALUE_SEPARATOR,
  canonicalName,
} from "./argument_pool.js";
import { CommandLineArgumentError, parserAssert } from "./errors.js";
import { renderCommandHelp, renderGeneralHelp } from "./help.js";
import { PipelineRunner } from "./pipeline.js";
import { printFlagsGroup } from "./print_flags.js";
import { resolveArguments, type Intermediates } from "./resolution.js";
import { isNumericLiteral } from "./value_types.js";

export const HELP_TOKENS: readonly string[] = ["-h", "-help", "--help"];

// Stands for stdin/stdout; a value even though it starts with the marker
export const STDIO_SENTINEL = "-";

const PAIR_SEPARATOR = /[:=]/;

export type TokenClass = "value" | "help" | "subcommand" | "pair" | "flag";

/**
 * Classifies one command line token. The first matching rule wins, which
 * is what lets `-100` through as a value instead of an unknown flag.
 * @param isSubcommand Whether the token currently selects a subcommand
 */
export function classifyToken(
  token: string,
  isSubcommand: (token: string) => boolean
): TokenClass {
  if (isNumericLiteral(token)) return "value";
  if (HELP_TOKENS.includes(token)) return "help";
  if (isSubcommand(token)) return "subcommand";
  if (!token.startsWith(FLAG_MARKER) || token === STDIO_SENTINEL) {
    return "value";
  }
  if (PAIR_SEPARATOR.test(token)) return "pair";
  return "flag";
}

/** Splits `-flag:value` / `-flag=value` at the first separator. */
export function splitFlagValuePair(token: string): [string, string] {
  const match = PAIR_SEPARATOR.exec(token);
  parserAssert(
    match !== null,
    "InvalidValue",
    `Error on flag-value pair: ${token}`
  );
  const flag = token.slice(0, match.index);
  const value = token.slice(match.index + 1);
  parserAssert(
    value.length > 0,
    "InvalidValue",
    `Value cannot be blank in pair: ${token}`
  );
  return [flag, value];
}

/**
 * Mutable state of one parse: the pool, the flag currently taking values
 * and the raw values seen so far. Never shared between parses.
 */
class ParseSession {
  readonly intermediates: Intermediates = new Map();
  subcommand: CommandSpec | null = null;
  private currentFlag: ParameterSpec | null = null;
  private currentFlagValues: string[] = [];

  constructor(
    readonly pool: ArgumentPool,
    private readonly subcommands: ReadonlyMap<string, CommandSpec>
  ) {}

  consume(token: string): void {
    const kind = classifyToken(token, (candidate) =>
      this.isSubcommand(candidate)
    );
    switch (kind) {
      case "value":
        this.addValue(token);
        break;
      case "subcommand":
        this.setSubcommand(token);
        break;
      case "pair":
        this.addPair(token);
        break;
      case "flag":
        this.setFlag(token);
        break;
      case "help":
        // Help requests are answered before tokenizing starts
        break;
    }
  }

  /** Closes whatever flag is still open at the end of the input. */
  finish(): void {
    this.closeCurrentFlag();
  }

  private isSubcommand(token: string): boolean {
    return this.subcommand === null && this.subcommands.has(token);
  }

  private setSubcommand(name: string): void {
    const command = this.subcommands.get(name);
    if (command === undefined) {
      throw new CommandLineArgumentError(
        "UnknownFlag",
        `Unknown subcommand ${name}`
      );
    }
    this.closeCurrentFlag();
    this.subcommand = command;
    this.pool.register(command);
  }

  private addValue(token: string): void {
    if (this.currentFlag === null) {
      this.currentFlag = this.pool.nextPositional();
      this.currentFlagValues = [];
    }
    this.currentFlagValues.push(token);
    if (this.currentFlag.kind !== "multiple") {
      this.closeCurrentFlag();
    }
  }

  private addPair(token: string): void {
    this.closeCurrentFlag();
    const [flagName, value] = splitFlagValuePair(token);
    const flag = this.pool.resolve(flagName);
    const values =
      flag.kind === "multiple" ? value.split(MULTI_VALUE_SEPARATOR) : [value];
    this.store(flag, values);
  }

  private setFlag(token: string): void {
    this.closeCurrentFlag();
    const flag = this.pool.resolve(token);
    // Switches take no value; their boolean is fixed during coercion
    if (flag.kind === "enable" || flag.kind === "disable") {
      this.store(flag, []);
      return;
    }
    this.currentFlag = flag;
    this.currentFlagValues = [];
  }

  private closeCurrentFlag(): void {
    const flag = this.currentFlag;
    if (flag === null) return;
    const values = this.currentFlagValues;
    this.currentFlag = null;
    this.currentFlagValues = [];

    if (values.length === 0) {
      const name = canonicalName(flag.name);
      parserAssert(
        flag.kind !== "value",
        "InvalidValue",
        `${name} requires a value`
      );
      parserAssert(
        flag.kind !== "multiple",
        "InvalidValue",
        `${name} requires at least one value`
      );
      // An optional flag without a value counts as not supplied
      return;
    }
    this.store(flag, values);
  }

  private store(flag: ParameterSpec, values: string[]): void {
    const name = canonicalName(flag.name);
    const existing = this.intermediates.get(name) ?? [];
    this.intermediates.set(name, [...existing, ...values]);
  }
}

export interface ParserOptions {
  programName?: string;
  description?: string;
  printFlags?: boolean; // Add -verbose/-debug/-quiet to the root (default true)
}

/**
 * Parses command line tokens against a root command and its subcommands.
 *
 * Subcommand parameters are registered lazily: only once the subcommand's
 * token is seen, so flags of other subcommands are unknown for that parse.
 */
export class CommandParser {
  readonly root: CommandSpec;
  private readonly subcommands = new Map<string, CommandSpec>();

  constructor(subcommands: CommandSpec[], options: ParserOptions = {}) {
    this.root = {
      name: options.programName ?? PROGRAM_NAME,
      help: options.description ?? PROGRAM_DESCRIPTION,
      parameters: options.printFlags === false ? [] : [printFlagsGroup()],
    };
    for (const subcommand of subcommands) {
      this.addSubcommand(subcommand);
    }
  }

  addSubcommand(subcommand: CommandSpec): void {
    parserAssert(
      !this.subcommands.has(subcommand.name),
      "InvalidSchema",
      `Subcommand "${subcommand.name}" is declared more than once`
    );
    this.subcommands.set(subcommand.name, subcommand);
  }

  listSubcommands(): CommandSpec[] {
    return [...this.subcommands.values()];
  }

  /**
   * Runs the whole pipeline for one invocation.
   * @throws CommandLineArgumentError on any structural problem
   */
  parse(tokens: readonly string[], context: PipelineContext): ParseResult {
    if (this.requestsHelp(tokens)) {
      return { status: "help", text: this.help(tokens, context.logger.style) };
    }

    const { args, command } = this.tokenize(tokens);
    const processed = new PipelineRunner(context).run(this.root, command, args);
    if (processed === null) {
      return { status: "rejected" };
    }
    return { status: "parsed", args: processed, command };
  }

  /**
   * Tokenizes and resolves without running post-processors or validators.
   */
  tokenize(tokens: readonly string[]): {
    args: ArgMap;
    command: CommandSpec | null;
  } {
    const session = new ParseSession(
      new ArgumentPool(this.root),
      this.subcommands
    );
    for (const token of tokens) {
      session.consume(token);
    }
    session.finish();

    const args = resolveArguments(
      session.pool,
      session.intermediates,
      session.subcommand
    );
    return { args, command: session.subcommand };
  }

  private requestsHelp(tokens: readonly string[]): boolean {
    return tokens.some(
      (token) => classifyToken(token, () => false) === "help"
    );
  }

  /**
   * Help for the first subcommand named in `tokens`, or the general help.
   */
  help(tokens: readonly string[], style: ChalkInstance): string {
    const name = tokens.find((token) => this.subcommands.has(token));
    const command = name === undefined ? undefined : this.subcommands.get(name);
    if (command === undefined) {
      return renderGeneralHelp(this.root, this.listSubcommands(), style);
    }
    return renderCommandHelp(this.root, command, style);
  }
}
