import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import process from "node:process";

import { Command, Option } from "commander";

import { executeJustifyCommand } from "../commands/justify/command.js";
import { loadJustifySettings } from "../configs/settings/loader.js";
import {
  JUSTIFY_STRATEGIES,
  type JustifyStrategy,
  LINE_ALIGNMENTS,
  type LineAlignment,
} from "../justify/types.js";
import { isMissing } from "../utils/fs.js";
import { parseWidthArgument } from "../utils/validators.js";
import { getJustifyVersion } from "../utils/version.js";
import { InputFileMissingError, MissingWidthError } from "./errors.js";
import { type InputText, readInputText } from "./input.js";
import { type Alert, writeCommandOutput } from "./output.js";

export interface JustifyCommandOptions {
  width?: number;
  strategy?: JustifyStrategy;
  align?: LineAlignment;
  input?: string;
  config?: string;
  verbose?: boolean;
  root?: string;
  stdin?: NodeJS.ReadableStream;
}

export interface JustifyCommandOutput {
  lines: readonly string[];
  alerts: Alert[];
}

export async function runJustifyCommand(
  options: JustifyCommandOptions = {},
): Promise<JustifyCommandOutput> {
  const root = options.root ?? process.cwd();
  const settings = loadJustifySettings({ root, filePath: options.config });

  const width = options.width ?? settings.width;
  if (width === undefined) {
    throw new MissingWidthError();
  }
  const strategy = options.strategy ?? settings.strategy;
  const align = options.align ?? settings.align;

  const alerts: Alert[] = [];
  const info = (message: string) => {
    if (options.verbose) {
      alerts.push({ severity: "info", message });
    }
  };

  let input: InputText;
  if (options.input !== undefined) {
    const text = await readInputFile(resolve(root, options.input));
    input = { text, interrupted: false };
  } else {
    info("Reading text from stdin...");
    input = await readStdin(options.stdin ?? process.stdin);
  }

  if (input.interrupted) {
    alerts.push({
      severity: "warn",
      message:
        "Interrupt received; reading stopped (last line may be missing).",
    });
  }

  const execution = executeJustifyCommand({
    text: input.text,
    width,
    strategy,
    align,
  });

  info(`Read ${execution.wordCount} words.`);
  for (const message of execution.warnings) {
    alerts.push({ severity: "warn", message });
  }
  info(`${strategy} badness: ${execution.badness}`);

  return { lines: execution.lines, alerts };
}

async function readInputFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isMissing(error)) {
      throw new InputFileMissingError(path);
    }
    throw error;
  }
}

async function readStdin(stream: NodeJS.ReadableStream): Promise<InputText> {
  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort();
  };

  process.once("SIGINT", onInterrupt);
  try {
    return await readInputText(stream, { signal: controller.signal });
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

interface JustifyActionOptions {
  strategy?: JustifyStrategy;
  align?: LineAlignment;
  input?: string;
  config?: string;
  verbose?: boolean;
}

export interface CreateJustifyProgramOptions {
  stdin?: NodeJS.ReadableStream;
}

export function createJustifyProgram(
  programOptions: CreateJustifyProgramOptions = {},
): Command {
  return new Command()
    .name("justify")
    .description(
      "Break text read from stdin into lines of at most <width> characters, keeping the right edge as even as possible",
    )
    .version(getJustifyVersion(), "-v, --version", "print the justify version")
    .argument("[width]", "maximum line length", parseWidthArgument)
    .addOption(
      new Option("--strategy <name>", "line breaking strategy").choices(
        JUSTIFY_STRATEGIES,
      ),
    )
    .addOption(
      new Option(
        "--align <mode>",
        "pad gaps so lines reach the full width",
      ).choices(LINE_ALIGNMENTS),
    )
    .option("--input <path>", "read text from a file instead of stdin")
    .option("--config <path>", "settings file (default: .justify.yaml)")
    .option("--verbose", "print diagnostics to stderr")
    .allowExcessArguments(false)
    .exitOverride()
    .showHelpAfterError()
    .action(async (width: number | undefined, options: JustifyActionOptions) => {
      const result = await runJustifyCommand({
        width,
        strategy: options.strategy,
        align: options.align,
        input: options.input,
        config: options.config,
        verbose: options.verbose,
        stdin: programOptions.stdin,
      });

      writeCommandOutput({ lines: result.lines, alerts: result.alerts });
    });
}
