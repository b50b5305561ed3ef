import type { ChalkInstance } from "chalk";
import type { CommandSpec, ParameterSpec } from "../types.js";
import {
  ArgumentPool,
  canonicalName,
  isGroupSpec,
  isPositional,
} from "./argument_pool.js";

const INDENT = "  ";
const DETAIL_INDENT = "      ";

function positionalUsage(spec: ParameterSpec): string {
  const label = `${spec.displayName ?? spec.name}${
    spec.kind === "multiple" ? "..." : ""
  }`;
  return spec.kind === "optional" ? `[${label}]` : label;
}

function flagUsage(spec: ParameterSpec): string {
  const token = spec.shorthand ?? spec.name;
  if (spec.kind === "enable" || spec.kind === "disable") return token;
  const value = spec.displayName ?? canonicalName(spec.name);
  return `${token} ${value}${spec.kind === "multiple" ? "..." : ""}`;
}

/** Usage fragments for the flags of one command, in declaration order. */
function usageFlags(command: CommandSpec): string[] {
  const fragments: string[] = [];
  for (const entry of command.parameters) {
    if (isGroupSpec(entry)) {
      const flags = entry.members.filter((member) => !isPositional(member));
      if (entry.mutuallyExclusive && flags.length > 0) {
        fragments.push(`[${flags.map(flagUsage).join(" | ")}]`);
      } else {
        fragments.push(...flags.map((flag) => `[${flagUsage(flag)}]`));
      }
    } else if (!isPositional(entry)) {
      fragments.push(`[${flagUsage(entry)}]`);
    }
  }
  return fragments;
}

function entryLabel(spec: ParameterSpec): string {
  if (isPositional(spec)) return spec.displayName ?? spec.name;
  return spec.shorthand ? `${spec.name}, ${spec.shorthand}` : spec.name;
}

function section(
  title: string,
  specs: ParameterSpec[],
  style: ChalkInstance
): string[] {
  if (specs.length === 0) return [];
  const width = Math.max(...specs.map((spec) => entryLabel(spec).length));
  const lines = [style.bold(title)];
  for (const spec of specs) {
    lines.push(`${INDENT}${entryLabel(spec).padEnd(width)}  ${spec.help}`);
    if (spec.default !== undefined) {
      lines.push(`${DETAIL_INDENT}(default: ${spec.default})`);
    }
    if (spec.choices) {
      lines.push(`${DETAIL_INDENT}(one of: ${spec.choices.join(", ")})`);
    }
  }
  return lines;
}

/**
 * Overview of the program and its subcommands.
 */
export function renderGeneralHelp(
  root: CommandSpec,
  subcommands: CommandSpec[],
  style: ChalkInstance
): string {
  const width = Math.max(0, ...subcommands.map((sub) => sub.name.length));
  const lines = [
    `${root.name} command options...`,
    "",
    root.help,
    "",
    style.bold("Subcommands:"),
    ...subcommands.map(
      (sub) => `${INDENT}${sub.name.padEnd(width)}  ${sub.help}`
    ),
  ];
  return lines.join("\n");
}

/**
 * Usage line and parameter reference for one subcommand, including the
 * flags inherited from the root command.
 */
export function renderCommandHelp(
  root: CommandSpec,
  command: CommandSpec,
  style: ChalkInstance
): string {
  const pool = new ArgumentPool(root, command);
  const positionals = pool.pendingPositionals();
  const flags = pool.parameters().filter((spec) => !isPositional(spec));

  const usage = [
    root.name,
    command.name,
    ...positionals.map(positionalUsage),
    ...usageFlags(root),
    ...usageFlags(command),
  ].join(" ");

  const lines = [usage, "", command.help];
  const parameterLines = section("Parameters:", positionals, style);
  if (parameterLines.length > 0) lines.push("", ...parameterLines);
  const flagLines = section("Flags:", flags, style);
  if (flagLines.length > 0) lines.push("", ...flagLines);
  return lines.join("\n");
}
