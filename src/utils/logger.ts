import { existsSync, mkdirSync } from "fs";
import { appendFile } from "fs/promises";
import { dirname } from "path";
import { Chalk, type ChalkInstance } from "chalk";

// Define log levels
export type LogLevel = "debug" | "verbose" | "info" | "warn" | "error";

// Console threshold; "silent" suppresses console output entirely
export type ConsoleLogLevel = LogLevel | "silent";

// Where debug, verbose and info lines go; warnings and errors always use stderr
export type ConsoleStream = "stdout" | "stderr";

// Interface for logger configuration
export interface LoggerConfig {
  logToConsole: boolean;
  logToFile: boolean;
  logFilePath?: string;
  consoleLogLevel: ConsoleLogLevel; // Separate level for console
  fileLogLevel: LogLevel; // Separate level for file
  useColors: boolean;
  consoleStream: ConsoleStream;
}

// Default configuration
const defaultConfig: LoggerConfig = {
  logToConsole: true,
  logToFile: false,
  consoleLogLevel: "info",
  fileLogLevel: "debug",
  useColors: true,
  consoleStream: "stdout",
};

/**
 * Numeric value for log level (for filtering)
 */
const logLevelValue: Record<ConsoleLogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

/**
 * Format a log message with timestamp and level
 */
function formatLogMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

/**
 * Leveled logger for terminal feedback with an optional log file.
 *
 * An instance is created by the entry point and handed to validators and
 * post-processors through the pipeline context, so reconfiguring it (for
 * example from the verbosity flags) affects everything that logs afterwards.
 */
export class Logger {
  private config: LoggerConfig;
  private chalk: ChalkInstance;
  private fileQueue: Promise<void> = Promise.resolve();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...defaultConfig };
    this.chalk = new Chalk();
    this.configure(config);
  }

  /**
   * Configure the logger
   * @param config Configuration options
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    this.chalk = new Chalk(this.config.useColors ? {} : { level: 0 });

    // Create log directory if logging to file
    if (this.config.logToFile && this.config.logFilePath) {
      const logDir = dirname(this.config.logFilePath);
      if (logDir && !existsSync(logDir)) {
        try {
          mkdirSync(logDir, { recursive: true });
        } catch (error) {
          console.error(`Failed to create log directory: ${error}`);
          this.config.logToFile = false;
        }
      }
    }
  }

  get settings(): Readonly<LoggerConfig> {
    return this.config;
  }

  /** Chalk instance honouring the colour setting, for styled output. */
  get style(): ChalkInstance {
    return this.chalk;
  }

  /** Resolves once every pending file write has completed. */
  flush(): Promise<void> {
    return this.fileQueue;
  }

  /** Checks if a level should be logged to a specific target. */
  private shouldLog(level: LogLevel, target: "console" | "file"): boolean {
    if (target === "console") {
      return (
        this.config.logToConsole &&
        logLevelValue[level] >= logLevelValue[this.config.consoleLogLevel]
      );
    }
    return (
      this.config.logToFile &&
      this.config.logFilePath !== undefined &&
      logLevelValue[level] >= logLevelValue[this.config.fileLogLevel]
    );
  }

  private logToConsole(level: LogLevel, coloredMessage: string): void {
    const belowWarn = logLevelValue[level] < logLevelValue.warn;
    if (this.config.consoleStream === "stderr" && belowWarn) {
      console.error(coloredMessage);
      return;
    }
    switch (level) {
      case "debug":
        console.debug(coloredMessage);
        break;
      case "verbose":
      case "info":
        console.info(coloredMessage);
        break;
      case "warn":
        console.warn(coloredMessage);
        break;
      case "error":
        console.error(coloredMessage);
        break;
    }
  }

  /** Queue a write to the log file; writes keep their order. */
  private logToFile(level: LogLevel, message: string, context?: string): void {
    const path = this.config.logFilePath;
    if (path === undefined) return;

    let messageToWrite = formatLogMessage(level, message);
    // Always include full context (like stack trace) in file log if present
    if (context) {
      messageToWrite += `\n  Context: ${context}`;
    }

    this.fileQueue = this.fileQueue
      .then(() => appendFile(path, messageToWrite + "\n"))
      .catch((error: unknown) => {
        console.error(`[Logger Error] Failed to write to log file: ${error}`);
      });
  }

  private log(
    level: LogLevel,
    paint: (text: string) => string,
    message: string,
    context?: string
  ): void {
    if (this.shouldLog(level, "console")) {
      this.logToConsole(level, paint(message));
    }
    if (this.shouldLog(level, "file")) {
      this.logToFile(level, message, context);
    }
  }

  debug(message: string, context?: string): void {
    this.log("debug", this.chalk.gray, message, context);
  }

  /** Extra detail shown with -verbose. */
  verbose(message: string, context?: string): void {
    this.log("verbose", this.chalk.cyan, message, context);
  }

  info(message: string, context?: string): void {
    this.log("info", (text) => text, message, context);
  }

  warn(message: string, context?: string): void {
    this.log("warn", this.chalk.yellow, message, context);
  }

  error(message: string, context?: string): void {
    this.log("error", this.chalk.red, message, context);
  }

  /**
   * Log a success message (info level with green color)
   */
  success(message: string, context?: string): void {
    this.log("info", this.chalk.green, message, context);
  }
}
