import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { CommandSpec } from "./types.js";
import type { RuntimeConfig } from "./config/defaults.js";
import { Logger } from "./utils/logger.js";
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, run } from "./main.js";

const config: RuntimeConfig = {
  programName: "subby",
  description: "Subtitle Editor",
  useColors: false,
};

const commands: CommandSpec[] = [
  {
    name: "ok",
    help: "Always works",
    parameters: [{ name: "-name", help: "A name", kind: "value" }],
    handler: async () => true,
  },
  {
    name: "nope",
    help: "Handler reports failure",
    parameters: [],
    handler: async () => false,
  },
  {
    name: "picky",
    help: "Rejects its arguments",
    parameters: [],
    validators: [() => false],
  },
  {
    name: "boom",
    help: "Throws",
    parameters: [],
    handler: async () => {
      throw new Error("kaput");
    },
  },
];

describe("run", () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let infoSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function runWith(argv: string[]): Promise<number> {
    return run(argv, {
      config,
      commands,
      logger: new Logger({ useColors: false }),
    });
  }

  it("prints general help for -h", async () => {
    expect(await runWith(["-h"])).toBe(EXIT_SUCCESS);
    const text = logSpy.mock.calls[0][0];
    expect(text).toContain("  ok     Always works");
  });

  it("prints general help without a subcommand", async () => {
    expect(await runWith([])).toBe(EXIT_SUCCESS);
    expect(logSpy.mock.calls[0][0]).toMatch(/^subby command options\.\.\./);
  });

  it("prints command help", async () => {
    expect(await runWith(["ok", "--help"])).toBe(EXIT_SUCCESS);
    expect(logSpy.mock.calls[0][0]).toMatch(
      /^subby ok \[-V\] \[-debug\] \[-q\] \[-name name\]\n/
    );
  });

  it("runs the handler", async () => {
    expect(await runWith(["ok", "-name", "x"])).toBe(EXIT_SUCCESS);
    expect(await runWith(["nope"])).toBe(EXIT_FAILURE);
  });

  it("reports parse errors with a usage hint", async () => {
    expect(await runWith(["ok", "-speed"])).toBe(EXIT_USAGE);
    expect(errorSpy).toHaveBeenCalledWith("Unknown flag -speed");
    expect(infoSpy).toHaveBeenCalledWith("Run 'subby -h' for usage");
  });

  it("fails when a validator rejects", async () => {
    expect(await runWith(["picky"])).toBe(EXIT_FAILURE);
  });

  it("boxes unexpected errors", async () => {
    expect(await runWith(["boom"])).toBe(EXIT_FAILURE);
    expect(errorSpy).toHaveBeenCalledWith("Fatal error: kaput");
    const boxed = errorSpy.mock.calls[1][0];
    expect(boxed).toContain("Fatal Error: kaput");
  });

  describe("with a log file", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "main-test-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the log before returning", async () => {
      const logFilePath = join(dir, "subby.log");
      const code = await run(["boom"], {
        config: { ...config, logFilePath },
        commands,
      });

      expect(code).toBe(EXIT_FAILURE);
      const log = await readFile(logFilePath, "utf-8");
      expect(log).toMatch(/\[ERROR\] Fatal error: kaput\n {2}Context: Error: kaput/);
    });
  });

  describe("writing subtitles to standard output", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "main-stdout-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("keeps progress lines off stdout", async () => {
      const input = join(dir, "in.srt");
      await writeFile(input, "1\n00:00:01,000 --> 00:00:02,000\nHello\n\n");
      const write = vi
        .spyOn(process.stdout, "write")
        .mockImplementation(() => true);

      const code = await run(["delay", input, "100", "-o", "-", "-V"], {
        config,
        logger: new Logger({ useColors: false }),
      });

      expect(code).toBe(EXIT_SUCCESS);
      expect(write.mock.calls).toEqual([
        ["1\n00:00:01,100 --> 00:00:02,100\nHello\n\n"],
      ]);
      expect(infoSpy).not.toHaveBeenCalled();
      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy.mock.calls).toEqual([
        [`Reading '${input}'`],
        ["Modified 1 of 1 lines"],
      ]);
    });
  });
});
