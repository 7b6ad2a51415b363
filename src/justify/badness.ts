import type { LineSpan, Partition, WordSequence } from "./types.js";

/** Characters the span occupies when its words are joined by single spaces. */
export function measureSpan(words: WordSequence, span: LineSpan): number {
  let length = span.end - span.start - 1;
  for (let index = span.start; index < span.end; index += 1) {
    length += words[index].length;
  }
  return length;
}

/**
 * Penalty for one line of `wordsOnLine` words spanning `lineLength`
 * characters. The last line of the output is free, as is a lone oversized
 * word. Any other overflow costs `Infinity`.
 */
export function lineBadness(
  lineLength: number,
  wordsOnLine: number,
  width: number,
  isLast: boolean,
): number {
  const slack = width - lineLength;
  if (slack < 0) {
    return wordsOnLine === 1 ? 0 : Number.POSITIVE_INFINITY;
  }

  if (isLast) {
    return 0;
  }

  return slack * slack;
}

/** `lineBadness` of `span`; it is the last line when it ends at `wordCount`. */
export function spanBadness(
  words: WordSequence,
  span: LineSpan,
  width: number,
  wordCount: number = words.length,
): number {
  return lineBadness(
    measureSpan(words, span),
    span.end - span.start,
    width,
    span.end === wordCount,
  );
}

export function partitionBadness(
  words: WordSequence,
  partition: Partition,
  width: number,
): number {
  return partition.reduce(
    (total, span) => total + spanBadness(words, span, width, words.length),
    0,
  );
}
