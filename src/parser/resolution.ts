import type { ArgValue, CommandSpec, ParameterSpec } from "../types.js";
import { ArgMap, SUBCOMMAND_KEY } from "./arg_map.js";
import {
  ArgumentPool,
  canonicalName,
  convertDefault,
  convertValue,
} from "./argument_pool.js";
import { CommandLineArgumentError, parserAssert } from "./errors.js";

// Raw values collected per canonical name while tokenizing
export type Intermediates = Map<string, string[]>;

function checkChoices(spec: ParameterSpec, raw: string): void {
  if (!spec.choices) return;
  parserAssert(
    spec.choices.includes(raw),
    "InvalidChoice",
    `"${raw}" is not valid for ${canonicalName(
      spec.name
    )} (choose from ${spec.choices.join(", ")})`
  );
}

/**
 * Types the raw values of one parameter according to its kind.
 */
export function coerce(spec: ParameterSpec, values: string[]): ArgValue {
  switch (spec.kind) {
    case "enable":
      return true;
    case "disable":
      return false;
    case "multiple":
      return values.map((raw) => {
        checkChoices(spec, raw);
        return convertValue(spec, raw);
      });
    case "value":
    case "optional": {
      parserAssert(
        values.length === 1,
        "InvalidValue",
        `${canonicalName(spec.name)} expects a single value but received ${
          values.length
        }`
      );
      const [raw] = values;
      checkChoices(spec, raw);
      return convertValue(spec, raw);
    }
  }
}

function checkGroups(pool: ArgumentPool, intermediates: Intermediates): void {
  for (const members of pool.mutuallyExclusiveGroups()) {
    const conflicts = members.filter((member) =>
      intermediates.has(canonicalName(member.name))
    );
    parserAssert(
      conflicts.length <= 1,
      "ConflictingFlags",
      `The following flags conflict: ${conflicts
        .map((member) => member.name)
        .join(", ")}`
    );
  }

  for (const members of pool.requiredGroups()) {
    const supplied = members.some((member) =>
      intermediates.has(canonicalName(member.name))
    );
    parserAssert(
      supplied,
      "MissingRequiredFlag",
      `One of the following flags is required: ${members
        .map((member) => member.name)
        .join(", ")}`
    );
  }
}

function resolveMissingPositionals(pool: ArgumentPool, parsed: ArgMap): void {
  for (const spec of pool.drainPositionals()) {
    const value = convertDefault(spec);
    if (value !== undefined) {
      parsed.set(spec.name, value);
      continue;
    }
    if (spec.kind === "optional") continue;
    throw new CommandLineArgumentError(
      "MissingPositional",
      `No value provided for positional argument: ${spec.name}`
    );
  }
}

/**
 * Turns the intermediates of a finished tokenization into the final map:
 * group checks, positional defaults, coercion, then the default merge.
 */
export function resolveArguments(
  pool: ArgumentPool,
  intermediates: Intermediates,
  subcommand: CommandSpec | null
): ArgMap {
  checkGroups(pool, intermediates);

  const parsed = new ArgMap();
  resolveMissingPositionals(pool, parsed);

  for (const [name, values] of intermediates) {
    parsed.set(name, coerce(pool.lookup(name), values));
  }

  const args = pool.defaults().merge(parsed);
  args.set(SUBCOMMAND_KEY, subcommand ? subcommand.name : null);
  return args;
}
