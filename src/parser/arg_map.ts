import type { ArgValue } from "../types.js";

// Key under which the matched subcommand name (or null) is stored
export const SUBCOMMAND_KEY = "subcmd";

/** Raised when an ArgMap accessor finds a missing key or the wrong type. */
export class ArgumentAccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentAccessError";
  }
}

function describe(value: ArgValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "list";
  return typeof value;
}

const isString = (value: ArgValue): value is string =>
  typeof value === "string";
const isNumber = (value: ArgValue): value is number =>
  typeof value === "number";

/**
 * Final argument set of a parse: a name to value map with typed accessors
 * that throw instead of silently defaulting.
 */
export class ArgMap {
  private readonly values: Map<string, ArgValue>;

  constructor(entries?: Iterable<readonly [string, ArgValue]>) {
    this.values = new Map(entries);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: ArgValue): this {
    this.values.set(name, value);
    return this;
  }

  delete(name: string): boolean {
    return this.values.delete(name);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  /** Raw value, or undefined when the key is absent. */
  peek(name: string): ArgValue | undefined {
    return this.values.get(name);
  }

  /** Copies every entry of `other` over this map. */
  merge(other: ArgMap): this {
    for (const [name, value] of other.values) {
      this.values.set(name, value);
    }
    return this;
  }

  toObject(): Record<string, ArgValue> {
    return Object.fromEntries(this.values);
  }

  get subcommand(): string | null {
    const value = this.values.get(SUBCOMMAND_KEY);
    return typeof value === "string" ? value : null;
  }

  private require(name: string): ArgValue {
    if (!this.values.has(name)) {
      throw new ArgumentAccessError(`No value for argument "${name}"`);
    }
    // has() was checked; a stored undefined is impossible through set()
    return this.values.get(name) ?? null;
  }

  /**
   * Returns the value of `name` when `guard` accepts it.
   * @param expected Type description used in the error message
   */
  get<T extends ArgValue>(
    name: string,
    guard: (value: ArgValue) => value is T,
    expected: string
  ): T {
    const value = this.require(name);
    if (!guard(value)) {
      throw new ArgumentAccessError(
        `Argument "${name}" is ${describe(value)}, expected ${expected}`
      );
    }
    return value;
  }

  /** Returns a list argument whose every element satisfies `guard`. */
  getList<T extends ArgValue>(
    name: string,
    guard: (value: ArgValue) => value is T,
    expected: string
  ): T[] {
    const value = this.require(name);
    if (!Array.isArray(value)) {
      throw new ArgumentAccessError(
        `Argument "${name}" is ${describe(value)}, expected a list of ${expected}`
      );
    }
    const items: T[] = [];
    for (const item of value) {
      if (!guard(item)) {
        throw new ArgumentAccessError(
          `Argument "${name}" contains ${describe(item)}, expected ${expected}`
        );
      }
      items.push(item);
    }
    return items;
  }

  getString(name: string): string {
    return this.get(name, isString, "string");
  }

  getOptionalString(name: string): string | undefined {
    return this.has(name) ? this.getString(name) : undefined;
  }

  getNumber(name: string): number {
    return this.get(name, isNumber, "number");
  }

  getBoolean(name: string): boolean {
    return this.get(
      name,
      (value): value is boolean => typeof value === "boolean",
      "boolean"
    );
  }

  getStrings(name: string): string[] {
    return this.getList(name, isString, "string");
  }

  getNumbers(name: string): number[] {
    return this.getList(name, isNumber, "number");
  }
}
