import { existsSync, mkdirSync } from "fs";
import { readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import type { Logger } from "./logger.js";

/**
 * Ensure a directory exists, creating it if necessary
 * @param dirPath Path to the directory
 * @returns True if successful, false otherwise
 */
export function ensureDir(dirPath: string, logger: Logger): boolean {
  try {
    if (!existsSync(dirPath)) {
      mkdirSync(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
    return true;
  } catch (error) {
    logger.error(`Failed to create directory ${dirPath}: ${error}`);
    return false;
  }
}

/**
 * Write text to a file, ensuring its directory exists
 * @returns Promise that resolves to true if successful
 */
export async function writeToFile(
  filePath: string,
  content: string,
  logger: Logger
): Promise<boolean> {
  try {
    if (!ensureDir(dirname(filePath), logger)) return false;
    await writeFile(filePath, content, "utf-8");
    logger.debug(`Wrote to file: ${filePath}`);
    return true;
  } catch (error) {
    logger.error(`Failed to write to file ${filePath}: ${error}`);
    return false;
  }
}

/**
 * Read a text file
 * @returns Promise that resolves to the file contents or null if error
 */
export async function readFromFile(
  filePath: string,
  logger: Logger
): Promise<string | null> {
  try {
    if (!existsSync(filePath)) {
      logger.error(`File does not exist: ${filePath}`);
      return null;
    }

    const content = await readFile(filePath, "utf-8");
    logger.debug(`Read from file: ${filePath}`);
    return content;
  } catch (error) {
    logger.error(`Failed to read from file ${filePath}: ${error}`);
    return null;
  }
}
