import { justifyWords } from "../../justify/index.js";
import type { JustifyStrategy, LineAlignment } from "../../justify/types.js";
import { splitWords } from "../../justify/words.js";

export interface JustifyCommandInput {
  text: string;
  width: number;
  strategy: JustifyStrategy;
  align: LineAlignment;
}

export interface JustifyCommandResult {
  lines: readonly string[];
  badness: number;
  wordCount: number;
  warnings: string[];
}

export function executeJustifyCommand(
  input: JustifyCommandInput,
): JustifyCommandResult {
  const { text, width, strategy, align } = input;
  const words = splitWords(text);

  const result = justifyWords(words, width, { strategy, align });

  const warnings = result.oversizedWords.map(
    (word) =>
      `Word "${word}" (${word.length} characters) is longer than the line length ${width}; it is placed on its own line.`,
  );

  return {
    lines: result.lines,
    badness: result.badness,
    wordCount: words.length,
    warnings,
  };
}
