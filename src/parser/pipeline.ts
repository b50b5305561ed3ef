import type {
  CommandSpec,
  PipelineContext,
  PostProcessor,
  Validator,
} from "../types.js";
import type { ArgMap } from "./arg_map.js";
import { isGroupSpec } from "./argument_pool.js";

/** Post-processors of a command followed by those of its groups. */
export function collectPostProcessors(command: CommandSpec): PostProcessor[] {
  const processors = [...(command.postProcessors ?? [])];
  for (const parameter of command.parameters) {
    if (isGroupSpec(parameter) && parameter.postProcessors) {
      processors.push(...parameter.postProcessors);
    }
  }
  return processors;
}

/** Validators of a command followed by those of its groups. */
export function collectValidators(command: CommandSpec): Validator[] {
  const validators = [...(command.validators ?? [])];
  for (const parameter of command.parameters) {
    if (isGroupSpec(parameter) && parameter.validators) {
      validators.push(...parameter.validators);
    }
  }
  return validators;
}

/**
 * Runs post-processing then validation, first for the root command and then
 * for the matched subcommand. The root stage comes first so that program
 * wide settings (verbosity) are in place before subcommand validators log.
 */
export class PipelineRunner {
  constructor(private readonly context: PipelineContext) {}

  /**
   * @returns The processed arguments, or null when a validator stopped the run
   */
  run(
    root: CommandSpec,
    subcommand: CommandSpec | null,
    args: ArgMap
  ): ArgMap | null {
    if (!this.runStage(root, args)) return null;
    if (subcommand && !this.runStage(subcommand, args)) return null;
    return args;
  }

  private runStage(command: CommandSpec, args: ArgMap): boolean {
    for (const postProcessor of collectPostProcessors(command)) {
      postProcessor(args, this.context);
    }

    for (const validator of collectValidators(command)) {
      if (!validator(args, this.context)) {
        this.context.logger.debug(
          `Validation for "${command.name}" stopped at ${
            validator.name || "an anonymous validator"
          }`
        );
        return false;
      }
    }
    return true;
  }
}
