#!/usr/bin/env node

import { realpathSync } from "fs";
import { fileURLToPath } from "url";
import boxen from "boxen";
import type { CommandSpec, PipelineContext } from "./types.js";
import { defaultCommands } from "./commands/index.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./config/defaults.js";
import { CommandParser } from "./parser/command_parser.js";
import { CommandLineArgumentError } from "./parser/errors.js";
import { Logger } from "./utils/logger.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1; // Rejected arguments, failed command, fatal error
export const EXIT_USAGE = 2; // Malformed command line

export interface RunOptions {
  config?: RuntimeConfig;
  logger?: Logger;
  commands?: CommandSpec[];
}

function createLogger(config: RuntimeConfig): Logger {
  return new Logger({
    useColors: config.useColors,
    logToFile: config.logFilePath !== undefined,
    logFilePath: config.logFilePath,
  });
}

async function dispatch(
  parser: CommandParser,
  argv: readonly string[],
  context: PipelineContext
): Promise<number> {
  const { logger } = context;
  const result = parser.parse(argv, context);

  switch (result.status) {
    case "help":
      console.log(result.text);
      return EXIT_SUCCESS;
    case "rejected":
      return EXIT_FAILURE;
    case "parsed": {
      const { args, command } = result;
      if (command === null || command.handler === undefined) {
        console.log(parser.help([], logger.style));
        return EXIT_SUCCESS;
      }
      logger.debug(
        `Running ${command.name} with ${JSON.stringify(args.toObject())}`
      );
      return (await command.handler(args, context))
        ? EXIT_SUCCESS
        : EXIT_FAILURE;
    }
  }
}

/**
 * Subtitle editor entry point
 * @param argv Command line without the node and script paths
 * @returns Process exit code
 */
export async function run(
  argv: readonly string[],
  options: RunOptions = {}
): Promise<number> {
  const config = options.config ?? loadRuntimeConfig();
  const logger = options.logger ?? createLogger(config);
  const parser = new CommandParser(options.commands ?? defaultCommands(), {
    programName: config.programName,
    description: config.description,
  });
  const context: PipelineContext = { programName: config.programName, logger };

  try {
    return await dispatch(parser, argv, context);
  } catch (err) {
    if (err instanceof CommandLineArgumentError) {
      logger.error(err.message);
      logger.info(`Run '${config.programName} -h' for usage`);
      return EXIT_USAGE;
    }

    const message = err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : undefined;
    logger.error(`Fatal error: ${message}`, stack);
    console.error(
      boxen(logger.style.red(`Fatal Error: ${message}\n${stack ?? ""}`), {
        padding: 1,
        margin: 1,
        borderColor: "red",
      })
    );
    return EXIT_FAILURE;
  } finally {
    await logger.flush();
  }
}

function isMainModule(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    // npm links the bin, so compare resolved paths
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Run if this is the main module
if (isMainModule()) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_FAILURE;
    });
}
