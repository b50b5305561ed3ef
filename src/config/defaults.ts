// Program identity and environment driven settings

export const PROGRAM_NAME = "subby";
export const PROGRAM_DESCRIPTION = "Subtitle Editor";

// Environment variable naming a log file that receives debug output
export const LOG_FILE_ENV = "SUBBY_LOG_FILE";

export interface RuntimeConfig {
  programName: string;
  description: string;
  logFilePath?: string;
  useColors: boolean;
}

/**
 * Settings taken from the environment before any argument is parsed.
 * @param env Environment to read, `process.env` by default
 */
export function loadRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const logFile = env[LOG_FILE_ENV]?.trim();
  return {
    programName: PROGRAM_NAME,
    description: PROGRAM_DESCRIPTION,
    logFilePath: logFile ? logFile : undefined,
    // https://no-color.org: any non-empty value disables colour
    useColors: !env.NO_COLOR,
  };
}
