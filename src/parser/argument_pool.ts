import type {
  ArgValue,
  CommandSpec,
  GroupSpec,
  ParameterSpec,
  SchemaEntry,
} from "../types.js";
import { ArgMap, SUBCOMMAND_KEY } from "./arg_map.js";
import { CommandLineArgumentError, parserAssert } from "./errors.js";

export const FLAG_MARKER = "-";

// Separates the values of a multiple-kind default or flag-value pair
export const MULTI_VALUE_SEPARATOR = ";";

export interface PooledGroup {
  members: ParameterSpec[];
  mutuallyExclusive: boolean;
  required: boolean;
}

/** Name with every leading flag marker removed: `--unit` -> `unit`. */
export function canonicalName(name: string): string {
  let start = 0;
  while (name[start] === FLAG_MARKER) start++;
  return name.slice(start);
}

export function isPositional(spec: ParameterSpec): boolean {
  return !spec.name.startsWith(FLAG_MARKER);
}

export function isParameterSpec(entry: SchemaEntry): entry is ParameterSpec {
  return "kind" in entry;
}

export function isGroupSpec(entry: SchemaEntry): entry is GroupSpec {
  return "members" in entry;
}

/**
 * Converts one raw value through the parameter's value type.
 * Failures surface as InvalidValue.
 */
export function convertValue(spec: ParameterSpec, raw: string): ArgValue {
  if (!spec.valueType) return raw;
  try {
    return spec.valueType(raw);
  } catch (error) {
    const reason = error instanceof Error ? `: ${error.message}` : "";
    throw new CommandLineArgumentError(
      "InvalidValue",
      `Invalid value for ${canonicalName(spec.name)}: "${raw}"${reason}`
    );
  }
}

/** Converts the declared default, or returns undefined when there is none. */
export function convertDefault(spec: ParameterSpec): ArgValue | undefined {
  if (spec.default === undefined) return undefined;
  if (spec.kind === "multiple") {
    return spec.default
      .split(MULTI_VALUE_SEPARATOR)
      .map((raw) => convertValue(spec, raw));
  }
  return convertValue(spec, spec.default);
}

/**
 * Queryable index of the parameters of the root command and, once it is
 * seen on the command line, the matched subcommand.
 */
export class ArgumentPool {
  private readonly positionalQueue: string[] = [];
  private readonly byName = new Map<string, ParameterSpec>();
  private readonly shorthandToLong = new Map<string, string>();
  private readonly groups: PooledGroup[] = [];

  constructor(...commands: CommandSpec[]) {
    for (const command of commands) {
      this.register(command);
    }
  }

  register(entry: SchemaEntry): void {
    if (isParameterSpec(entry)) {
      this.registerParameter(entry);
    } else if (isGroupSpec(entry)) {
      this.registerGroup(entry);
    } else {
      for (const parameter of entry.parameters) {
        this.register(parameter);
      }
    }
  }

  private registerParameter(spec: ParameterSpec): void {
    const name = canonicalName(spec.name);
    parserAssert(
      name.length > 0 && name !== SUBCOMMAND_KEY,
      "InvalidSchema",
      `"${spec.name}" cannot be used as a parameter name`
    );
    parserAssert(
      !this.byName.has(name) && !this.shorthandToLong.has(name),
      "InvalidSchema",
      `Parameter "${name}" is declared more than once`
    );

    if (isPositional(spec)) {
      parserAssert(
        spec.kind !== "enable" && spec.kind !== "disable",
        "InvalidSchema",
        `Positional "${name}" cannot be a switch`
      );
      parserAssert(
        spec.shorthand === undefined,
        "InvalidSchema",
        `Positional "${name}" cannot have a shorthand`
      );
      this.positionalQueue.push(name);
      this.byName.set(name, spec);
      return;
    }

    if (spec.shorthand !== undefined) {
      const shorthand = canonicalName(spec.shorthand);
      parserAssert(
        shorthand.length > 0 &&
          !this.byName.has(shorthand) &&
          !this.shorthandToLong.has(shorthand),
        "InvalidSchema",
        `Shorthand "${spec.shorthand}" of "${name}" is already taken`
      );
      this.shorthandToLong.set(shorthand, name);
    }
    this.byName.set(name, spec);
  }

  private registerGroup(group: GroupSpec): void {
    for (const member of group.members) {
      this.registerParameter(member);
    }
    this.groups.push({
      members: [...group.members],
      mutuallyExclusive: group.mutuallyExclusive,
      required: group.required ?? false,
    });
  }

  /** Pops the next positional; fails when every positional is taken. */
  nextPositional(): ParameterSpec {
    const name = this.positionalQueue.shift();
    parserAssert(
      name !== undefined,
      "TooManyPositionals",
      "Too many positional arguments provided"
    );
    return this.lookup(name);
  }

  /** Pops every positional that has not received a value. */
  drainPositionals(): ParameterSpec[] {
    const remaining = this.positionalQueue.splice(0);
    return remaining.map((name) => this.lookup(name));
  }

  /** Positionals still waiting for a value, without consuming them. */
  pendingPositionals(): ParameterSpec[] {
    return this.positionalQueue.map((name) => this.lookup(name));
  }

  /** Resolves a flag token (`-u`, `--unit`) to its parameter. */
  resolve(token: string): ParameterSpec {
    const stripped = canonicalName(token);
    const name = this.shorthandToLong.get(stripped) ?? stripped;
    const spec = this.byName.get(name);
    if (spec === undefined) {
      throw new CommandLineArgumentError(
        "UnknownFlag",
        `Unknown flag ${token}`
      );
    }
    parserAssert(
      !isPositional(spec),
      "PositionalUsedAsFlag",
      `${stripped} is a positional argument and cannot be used as a flag`
    );
    return spec;
  }

  /** Any registered parameter by canonical name, positionals included. */
  lookup(name: string): ParameterSpec {
    const spec = this.byName.get(name);
    if (spec === undefined) {
      throw new CommandLineArgumentError(
        "UnknownFlag",
        `Unknown argument ${name}`
      );
    }
    return spec;
  }

  parameters(): ParameterSpec[] {
    return [...this.byName.values()];
  }

  /** Default value of every parameter that has one; switches always do. */
  defaults(): ArgMap {
    const defaults = new ArgMap();
    for (const [name, spec] of this.byName) {
      if (spec.kind === "enable") {
        defaults.set(name, false);
        continue;
      }
      if (spec.kind === "disable") {
        defaults.set(name, true);
        continue;
      }
      const value = convertDefault(spec);
      if (value !== undefined) {
        defaults.set(name, value);
      }
    }
    return defaults;
  }

  mutuallyExclusiveGroups(): ParameterSpec[][] {
    return this.groups
      .filter((group) => group.mutuallyExclusive)
      .map((group) => group.members);
  }

  requiredGroups(): ParameterSpec[][] {
    return this.groups
      .filter((group) => group.required)
      .map((group) => group.members);
  }
}
