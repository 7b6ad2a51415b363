import { readFileSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { Readable } from "node:stream";

import {
  afterAll,
  afterEach,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import { runCli } from "../../src/bin.js";

const RED = (text: string) => `\u001B[31m${text}\u001B[39m`;
const YELLOW = (text: string) => `\u001B[33m${text}\u001B[39m`;
const CYAN = (text: string) => `\u001B[36m${text}\u001B[39m`;

describe("justify CLI", () => {
  let stdout: string[];
  let stderr: string[];
  let stdoutSpy: jest.SpiedFunction<typeof process.stdout.write>;
  let stderrSpy: jest.SpiedFunction<typeof process.stderr.write>;
  let workDir: string;
  let absentConfig: string;

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), "justify-cli-"));
    absentConfig = join(workDir, "absent.yaml");
  });

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    stdout = [];
    stderr = [];
    stdoutSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation((chunk: unknown) => {
        stdout.push(String(chunk));
        return true;
      });
    stderrSpy = jest
      .spyOn(process.stderr, "write")
      .mockImplementation((chunk: unknown) => {
        stderr.push(String(chunk));
        return true;
      });
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
  });

  function run(args: string[], text = ""): Promise<void> {
    return runCli(["node", "justify", ...args], {
      stdin: Readable.from([text]),
    });
  }

  it("writes optimally broken lines to stdout", async () => {
    await run(
      ["6", "--config", absentConfig],
      "aaaa bb cc dddd\ne fff gg h\n",
    );

    expect(stdout.join("")).toBe("aaaa\nbb cc\ndddd e\nfff gg\nh\n");
    expect(stderr).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });

  it("writes nothing for empty input", async () => {
    await run(["10", "--config", absentConfig], "  \n");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it("uses first-fit packing with --strategy greedy", async () => {
    await run(
      ["6", "--strategy", "greedy", "--config", absentConfig],
      "aaa bb cc ddddd",
    );

    expect(stdout.join("")).toBe("aaa bb\ncc\nddddd\n");
  });

  it("pads lines with --align full", async () => {
    await run(
      ["6", "--align", "full", "--config", absentConfig],
      "aaa bb cc ddddd",
    );

    expect(stdout.join("")).toBe("aaa   \nbb  cc\nddddd\n");
  });

  it("prints diagnostics to stderr with --verbose", async () => {
    await run(
      ["6", "--verbose", "--config", absentConfig],
      "aaa bb cc ddddd",
    );

    expect(stdout.join("")).toBe("aaa\nbb cc\nddddd\n");
    expect(stderr).toEqual([
      `${CYAN("Info:")} Reading text from stdin...\n`,
      `${CYAN("Info:")} Read 4 words.\n`,
      `${CYAN("Info:")} optimal badness: 10\n`,
    ]);
  });

  it("warns about oversized words and still prints them", async () => {
    await run(["5", "--config", absentConfig], "tiny enormous end");

    expect(stdout.join("")).toBe("tiny\nenormous\nend\n");
    expect(stderr).toEqual([
      `${YELLOW("Warning:")} Word "enormous" (8 characters) is longer than the line length 5; it is placed on its own line.\n`,
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("rejects a malformed width", async () => {
    await run(["abc"], "words");

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      `${RED("Error:")} Invalid line length format, expected integer, got "abc".\n`,
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("rejects a zero width", async () => {
    await run(["0"], "words");

    expect(stderr).toEqual([
      `${RED("Error:")} Line length must be greater than 0.\n`,
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("explains how to supply a missing width", async () => {
    await run(["--config", absentConfig], "words");

    expect(stderr).toEqual([
      [
        `${RED("Error:")} Missing line length.`,
        "",
        "Pass it as the first argument, e.g. `justify 72 < input.txt`, or set `width` in .justify.yaml.",
        "",
      ].join("\n"),
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("takes width and strategy from a settings file", async () => {
    const configPath = join(workDir, "settings.yaml");
    await writeFile(configPath, "width: 6\nstrategy: greedy\n", "utf8");

    await run(["--config", configPath], "aaa bb cc ddddd");

    expect(stdout.join("")).toBe("aaa bb\ncc\nddddd\n");
  });

  it("lets the width argument override the settings file", async () => {
    const configPath = join(workDir, "override.yaml");
    await writeFile(configPath, "width: 3\n", "utf8");

    await run(["5", "--config", configPath], "ab cd");

    expect(stdout.join("")).toBe("ab cd\n");
  });

  it("reports an invalid settings file", async () => {
    const configPath = join(workDir, "invalid.yaml");
    await writeFile(configPath, "width: -2\n", "utf8");

    await run(["--config", configPath], "words");

    expect(stderr).toEqual([
      [
        `${RED("Error:")} Invalid settings file at ${configPath}: width must be greater than 0`,
        "",
        "Fix the file or pass --config with the path to a valid settings file.",
        "",
      ].join("\n"),
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("reads text from --input", async () => {
    const inputPath = join(workDir, "input.txt");
    await writeFile(inputPath, "ab\ncd\n", "utf8");

    await run(["5", "--input", inputPath, "--config", absentConfig]);

    expect(stdout.join("")).toBe("ab cd\n");
  });

  it("reports a missing --input file", async () => {
    const inputPath = join(workDir, "nope.txt");

    await run(["5", "--input", inputPath, "--config", absentConfig]);

    expect(stderr).toEqual([
      `${RED("Error:")} Input file not found: ${inputPath}\n`,
    ]);
    expect(process.exitCode).toBe(1);
  });

  it("leaves unknown option errors to commander", async () => {
    await run(["6", "--fast"]);

    const combined = stderr.join("");
    expect(stdout).toEqual([]);
    const occurrences = combined.match(/error: unknown option '--fast'/gu);
    expect(occurrences ?? []).toHaveLength(1);
    expect(process.exitCode).toBe(1);
  });

  it("lists the allowed strategies for a bad --strategy", async () => {
    await run(["6", "--strategy", "fast"]);

    expect(stderr.join("")).toContain("Allowed choices are optimal, greedy.");
    expect(process.exitCode).toBe(1);
  });

  it("prints the package version for --version", async () => {
    const packageJson = JSON.parse(
      readFileSync(resolve(__dirname, "../../package.json"), "utf8"),
    ) as { version: string };

    await run(["--version"]);

    expect(stdout.join("").trim()).toBe(packageJson.version);
    expect(stderr).toEqual([]);
    expect(process.exitCode).toBe(0);
  });
});
