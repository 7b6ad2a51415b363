import type { LineSpan, Partition, WordSequence } from "./types.js";

/** First-fit packing: each line takes words until the next would overflow. */
export function computeGreedyPartition(
  words: WordSequence,
  width: number,
): Partition {
  const spans: LineSpan[] = [];
  let start = 0;
  let lineLength = 0;

  for (let index = 0; index < words.length; index += 1) {
    const wordLength = words[index].length;
    if (index === start) {
      lineLength = wordLength;
      continue;
    }

    const extended = lineLength + 1 + wordLength;
    if (extended > width) {
      spans.push({ start, end: index });
      start = index;
      lineLength = wordLength;
      continue;
    }

    lineLength = extended;
  }

  if (start < words.length) {
    spans.push({ start, end: words.length });
  }

  return spans;
}
