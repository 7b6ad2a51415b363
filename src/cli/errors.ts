import type { CommanderError } from "commander";

import { HintedError, toErrorMessage } from "../utils/errors.js";

export class CliError extends HintedError {
  constructor(
    headline: string,
    detailLines: readonly string[] = [],
    hintLines: readonly string[] = [],
  ) {
    super(headline, { detailLines, hintLines });
    this.name = "CliError";
  }
}

export class MissingWidthError extends CliError {
  constructor() {
    super(
      "Missing line length.",
      [],
      [
        "Pass it as the first argument, e.g. `justify 72 < input.txt`, or set `width` in .justify.yaml.",
      ],
    );
    this.name = "MissingWidthError";
  }
}

export class InputFileMissingError extends CliError {
  constructor(path: string) {
    super(`Input file not found: ${path}`);
    this.name = "InputFileMissingError";
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof HintedError) {
    return new CliError(error.headline, error.detailLines, error.hintLines);
  }

  return new CliError(toErrorMessage(error));
}

/** commander writes these itself before throwing under `exitOverride()`. */
const COMMANDER_SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.error",
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.unknownOption",
  "commander.version",
]);

export function commanderAlreadyRendered(error: CommanderError): boolean {
  if (!error.code) {
    return false;
  }

  if (COMMANDER_SELF_RENDERED_CODES.has(error.code)) {
    return true;
  }

  return (
    error.code.startsWith("commander.") && error.message.startsWith("error:")
  );
}
