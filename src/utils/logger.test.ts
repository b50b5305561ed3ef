import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Logger } from "./logger.js";

describe("Logger", () => {
  let infoSpy: ReturnType<typeof vi.spyOn>;
  let debugSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
    debugSpy = vi.spyOn(console, "debug").mockImplementation(() => {});
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes each level to its console method", () => {
    const logger = new Logger({ consoleLogLevel: "debug", useColors: false });

    logger.debug("d");
    logger.verbose("v");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    logger.success("s");

    expect(debugSpy).toHaveBeenCalledWith("d");
    expect(infoSpy.mock.calls).toEqual([["v"], ["i"], ["s"]]);
    expect(warnSpy).toHaveBeenCalledWith("w");
    expect(errorSpy).toHaveBeenCalledWith("e");
  });

  it("moves progress output to stderr when stdout carries data", () => {
    const logger = new Logger({ consoleLogLevel: "debug", useColors: false });
    logger.configure({ consoleStream: "stderr" });

    logger.debug("d");
    logger.verbose("v");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("w");
    expect(errorSpy.mock.calls).toEqual([["d"], ["v"], ["i"], ["e"]]);
  });

  it("drops messages below the console level", () => {
    const logger = new Logger({ consoleLogLevel: "warn", useColors: false });

    logger.info("hidden");
    logger.warn("shown");

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith("shown");
  });

  it("prints nothing when silent", () => {
    const logger = new Logger({ useColors: false });
    logger.configure({ consoleLogLevel: "silent" });

    logger.error("nothing");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("colours output unless colours are off", () => {
    const logger = new Logger({ useColors: true });
    logger.error("red");
    const colored = errorSpy.mock.calls[0][0];
    expect(colored).toContain("red");

    logger.configure({ useColors: false });
    logger.error("plain");
    expect(errorSpy).toHaveBeenLastCalledWith("plain");
  });

  describe("file output", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "logger-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("appends formatted lines in order at the file level", async () => {
      const logFilePath = join(dir, "logs", "run.log");
      const logger = new Logger({
        logToConsole: false,
        logToFile: true,
        logFilePath,
        fileLogLevel: "verbose",
      });

      logger.debug("skipped");
      logger.verbose("first");
      logger.error("second", "stack line");
      await logger.flush();

      const lines = (await readFile(logFilePath, "utf-8")).split("\n");
      expect(lines).toHaveLength(4);
      expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[VERBOSE\] first$/);
      expect(lines[1]).toMatch(/\[ERROR\] second$/);
      expect(lines[2]).toBe("  Context: stack line");
      expect(lines[3]).toBe("");
    });

    it("keeps uncoloured text in the file", async () => {
      const logFilePath = join(dir, "run.log");
      const logger = new Logger({
        logToConsole: false,
        logToFile: true,
        logFilePath,
        useColors: true,
      });

      logger.success("done");
      await logger.flush();

      expect(await readFile(logFilePath, "utf-8")).toMatch(/\[INFO\] done\n$/);
    });
  });
});
