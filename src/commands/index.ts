import type { CommandSpec } from "../types.js";
import { delayCommand } from "./delay.js";
import { displayCommand } from "./display.js";
import { extendCommand } from "./extend.js";
import { trimCommand } from "./trim.js";

export { delayCommand, displayCommand, extendCommand, trimCommand };

/** Subcommands of the `subby` program, in help order. */
export function defaultCommands(): CommandSpec[] {
  return [displayCommand, delayCommand, trimCommand, extendCommand];
}
