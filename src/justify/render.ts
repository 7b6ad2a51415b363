import { measureSpan } from "./badness.js";
import type {
  LineAlignment,
  LineSpan,
  Partition,
  WordSequence,
} from "./types.js";

export interface RenderLineOptions {
  align: LineAlignment;
  isLast: boolean;
}

export function renderLine(
  words: WordSequence,
  span: LineSpan,
  width: number,
  options: RenderLineOptions,
): string {
  const lineWords = words.slice(span.start, span.end);
  const slack = width - measureSpan(words, span);

  if (options.align === "left" || options.isLast || slack <= 0) {
    return lineWords.join(" ");
  }

  if (lineWords.length === 1) {
    return `${lineWords[0]}${" ".repeat(slack)}`;
  }

  const gaps = lineWords.length - 1;
  const base = Math.floor(slack / gaps);
  let remainder = slack % gaps;

  let line = lineWords[0];
  for (const word of lineWords.slice(1)) {
    let spaces = 1 + base;
    // leftmost gaps absorb the remainder
    if (remainder > 0) {
      spaces += 1;
      remainder -= 1;
    }
    line += `${" ".repeat(spaces)}${word}`;
  }

  return line;
}

export function renderPartition(
  words: WordSequence,
  partition: Partition,
  width: number,
  align: LineAlignment,
): string[] {
  return partition.map((span, index) =>
    renderLine(words, span, width, {
      align,
      isLast: index === partition.length - 1,
    }),
  );
}
