import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { PipelineContext, SrtEntry } from "../types.js";
import { CommandParser } from "../parser/command_parser.js";
import { CommandLineArgumentError } from "../parser/errors.js";
import { Logger } from "../utils/logger.js";
import { extendEntries } from "./extend.js";
import { defaultCommands } from "./index.js";

const SAMPLE = `1
00:00:01,000 --> 00:00:02,000
One

2
00:00:03,000 --> 00:00:04,000
Two

3
00:00:05,000 --> 00:00:06,000
Three

`;

let dir: string;
let input: string;
let output: string;
let context: PipelineContext;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "commands-test-"));
  input = join(dir, "in.srt");
  output = join(dir, "out.srt");
  await writeFile(input, SAMPLE);
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
  context = { programName: "subby", logger: new Logger({ useColors: false }) };
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

type Outcome = "rejected" | "succeeded" | "failed";

async function invoke(tokens: string[]): Promise<Outcome> {
  const result = new CommandParser(defaultCommands()).parse(tokens, context);
  if (result.status === "rejected") return "rejected";
  if (result.status !== "parsed" || !result.command?.handler) {
    throw new Error(`Unexpected parse result for ${tokens.join(" ")}`);
  }
  return (await result.command.handler(result.args, context))
    ? "succeeded"
    : "failed";
}

function block(index: number, timing: string, text: string): string {
  return `${index}\n${timing}\n${text}\n\n`;
}

describe("delay", () => {
  it("shifts every line by milliseconds", async () => {
    expect(await invoke(["delay", input, "500", "-o", output])).toBe(
      "succeeded"
    );
    expect(await readFile(output, "utf-8")).toBe(
      block(1, "00:00:01,500 --> 00:00:02,500", "One") +
        block(2, "00:00:03,500 --> 00:00:04,500", "Two") +
        block(3, "00:00:05,500 --> 00:00:06,500", "Three")
    );
    expect(console.info).toHaveBeenCalledWith("Modified 3 of 3 lines");
  });

  it("shifts a range by seconds and keeps only that range", async () => {
    const tokens = [
      "delay",
      `${input}:#2-end`,
      "1",
      "-u",
      "s",
      "-R",
      "-x",
      "-o",
      output,
    ];
    expect(await invoke(tokens)).toBe("succeeded");
    expect(await readFile(output, "utf-8")).toBe(
      block(2, "00:00:04,000 --> 00:00:05,000", "Two") +
        block(3, "00:00:06,000 --> 00:00:07,000", "Three")
    );
  });

  it("takes a negative delay and overwrites the input", async () => {
    expect(await invoke(["delay", input, "-1000", "-O"])).toBe("succeeded");
    const content = await readFile(input, "utf-8");
    expect(content.split("\n\n")[0]).toBe(
      "1\n00:00:00,000 --> 00:00:01,000\nOne"
    );
  });

  it("rejects a range given without -R", async () => {
    expect(await invoke(["delay", `${input}:#1-#2`, "5", "-O"])).toBe(
      "rejected"
    );
    expect(console.warn).toHaveBeenCalledWith(
      "If you specified a range, use -R to enable range parsing"
    );
  });

  it("rejects a malformed range", async () => {
    expect(await invoke(["delay", `${input}:#1`, "5", "-R", "-O"])).toBe(
      "rejected"
    );
  });

  it("needs an output choice", async () => {
    await expect(invoke(["delay", input, "5"])).rejects.toThrow(
      CommandLineArgumentError
    );
  });

  it("fails when the input cannot be read", async () => {
    const missing = join(dir, "missing.srt");
    expect(await invoke(["delay", missing, "5", "-O"])).toBe("failed");
    expect(console.error).toHaveBeenCalledWith(
      `File does not exist: ${missing}`
    );
  });
});

describe("trim", () => {
  it("keeps a line range and renumbers", async () => {
    expect(await invoke(["trim", input, "#2-#3", "-o", output])).toBe(
      "succeeded"
    );
    expect(await readFile(output, "utf-8")).toBe(
      block(1, "00:00:03,000 --> 00:00:04,000", "Two")
    );
  });

  it("keeps a time range given on the input", async () => {
    const tokens = ["trim", `${input}:00:00:02,500-end`, "-R", "-o", output];
    expect(await invoke(tokens)).toBe("succeeded");
    expect(await readFile(output, "utf-8")).toBe(
      block(1, "00:00:03,000 --> 00:00:04,000", "Two") +
        block(2, "00:00:05,000 --> 00:00:06,000", "Three")
    );
  });

  it("rejects a range positional together with -R", async () => {
    expect(
      await invoke(["trim", `${input}:#1-#2`, "#2-#3", "-R", "-O"])
    ).toBe("rejected");
    expect(console.error).toHaveBeenCalledWith(
      "Cannot have conflicting ranges"
    );
  });
});

describe("extend", () => {
  function timed(startMs: number, endMs: number): SrtEntry {
    return { index: 1, timing: { startMs, endMs }, lines: [] };
  }

  it("extends toward the next line, keeping the gap", () => {
    const extended = extendEntries(
      [
        timed(1_000, 2_000),
        timed(2_050, 3_000),
        timed(3_500, 4_000),
        timed(4_250, 5_000),
        timed(10_000, 11_000),
      ],
      300,
      100
    );
    expect(extended.map((entry) => entry.timing.endMs)).toEqual([
      2_000, 3_300, 4_150, 5_300, 11_000,
    ]);
  });

  it("uses the default threshold", async () => {
    expect(await invoke(["extend", input, "1500", "-o", output])).toBe(
      "succeeded"
    );
    expect(await readFile(output, "utf-8")).toBe(
      block(1, "00:00:01,000 --> 00:00:02,900", "One") +
        block(2, "00:00:03,000 --> 00:00:04,900", "Two") +
        block(3, "00:00:05,000 --> 00:00:06,000", "Three")
    );
  });

  it("takes the threshold as a second positional", async () => {
    expect(await invoke(["extend", input, "1500", "400", "-o", output])).toBe(
      "succeeded"
    );
    expect(await readFile(output, "utf-8")).toContain(
      "00:00:01,000 --> 00:00:02,600"
    );
  });
});

describe("display", () => {
  it("reports a clean file", async () => {
    expect(await invoke(["display", input])).toBe("succeeded");
    expect(vi.mocked(console.info).mock.calls).toEqual([
      [`srt subtitles: ${input}`],
      ["  contains 3 lines"],
      ["  no issues"],
      [""],
    ]);
  });

  it("reports issues of several files in detail", async () => {
    const broken = join(dir, "broken.srt");
    await writeFile(broken, "5\n00:00:01,000 --> 00:00:02,000\nA");

    expect(await invoke(["display", "-long", input, broken])).toBe(
      "succeeded"
    );
    expect(vi.mocked(console.info).mock.calls).toEqual([
      ["Displaying information for 2 files"],
      [`srt subtitles: ${input}`],
      ["  contains 3 lines"],
      ["  no issues"],
      [""],
      [`srt subtitles: ${broken}`],
      ["  contains 1 lines"],
      ["Reported line number\tActual line number"],
      ["5\t1"],
      [""],
    ]);
    expect(vi.mocked(console.warn).mock.calls).toEqual([
      ["  missing terminating blank line"],
      ["  1 cases of mismatched line indices"],
      ["  this might suggest missing lines"],
    ]);
  });

  it("warns that ranges are ignored", async () => {
    expect(await invoke(["display", `${input}:#1-#2`, "-R"])).toBe(
      "succeeded"
    );
    expect(console.warn).toHaveBeenCalledWith(
      `Ignoring provided range for ${input}...`
    );
  });

  it("rejects files that are not srt", async () => {
    expect(await invoke(["display", input, join(dir, "notes.txt")])).toBe(
      "rejected"
    );
  });
});
