#!/usr/bin/env node

import process from "node:process";

import { CommanderError } from "commander";

import { commanderAlreadyRendered, toCliError } from "./cli/errors.js";
import { createJustifyProgram } from "./cli/justify.js";
import { writeCommandOutput } from "./cli/output.js";
import { renderCliError } from "./render/utils/errors.js";
import { formatErrorMessage } from "./utils/output.js";

export interface RunCliOptions {
  stdin?: NodeJS.ReadableStream;
}

export async function runCli(
  argv: readonly string[] = process.argv,
  options: RunCliOptions = {},
): Promise<void> {
  const program = createJustifyProgram({ stdin: options.stdin });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode;
        return;
      }

      writeCommandOutput({
        stderr: formatErrorMessage(error.message),
        exitCode: error.exitCode,
      });
      return;
    }

    writeCommandOutput({
      stderr: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module) {
  void runCli();
}
