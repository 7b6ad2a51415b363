import { lineBadness } from "./badness.js";
import type { LineSpan, Partition, WordSequence } from "./types.js";

/**
 * Suffix table: `cost[k]` is the least badness for words `[k, n)` and
 * `next[k]` the end of the first line in that layout.
 */
export interface OptimalPartitionTable {
  readonly cost: readonly number[];
  readonly next: readonly number[];
}

export function buildOptimalPartitionTable(
  words: WordSequence,
  width: number,
): OptimalPartitionTable {
  const wordCount = words.length;
  const cost = new Array<number>(wordCount + 1).fill(0);
  const next = new Array<number>(wordCount).fill(wordCount);

  for (let start = wordCount - 1; start >= 0; start -= 1) {
    let best = Number.POSITIVE_INFINITY;
    let bestEnd = start + 1;
    let lineLength = -1;

    for (let end = start + 1; end <= wordCount; end += 1) {
      lineLength += 1 + words[end - 1].length;
      const wordsOnLine = end - start;
      if (lineLength > width && wordsOnLine > 1) {
        break;
      }

      const candidate =
        lineBadness(lineLength, wordsOnLine, width, end === wordCount) +
        cost[end];
      // ties go to the larger end
      if (candidate <= best) {
        best = candidate;
        bestEnd = end;
      }

      if (lineLength > width) {
        break;
      }
    }

    cost[start] = best;
    next[start] = bestEnd;
  }

  return { cost, next };
}

/** Minimum-badness partition of `words` into lines of at most `width`. */
export function computeOptimalPartition(
  words: WordSequence,
  width: number,
): Partition {
  const { next } = buildOptimalPartitionTable(words, width);
  const spans: LineSpan[] = [];

  let start = 0;
  while (start < words.length) {
    const end = next[start];
    spans.push({ start, end });
    start = end;
  }

  return spans;
}
