import { partitionBadness } from "./badness.js";
import { assertValidWidth } from "./errors.js";
import { computeGreedyPartition } from "./greedy.js";
import { computeOptimalPartition } from "./optimal.js";
import { renderPartition } from "./render.js";
import type {
  JustifyOptions,
  JustifyResult,
  JustifyStrategy,
  Partition,
  WordSequence,
} from "./types.js";

const PARTITIONERS: Record<
  JustifyStrategy,
  (words: WordSequence, width: number) => Partition
> = {
  optimal: computeOptimalPartition,
  greedy: computeGreedyPartition,
};

/**
 * Break `words` into lines no wider than `width`, minimizing the summed
 * square of trailing space on every line but the last.
 *
 * Throws `InvalidWidthError` unless `width` is a positive integer.
 */
export function justify(words: WordSequence, width: number): string[] {
  return [...justifyWords(words, width).lines];
}

export function justifyWords(
  words: WordSequence,
  width: number,
  options: JustifyOptions = {},
): JustifyResult {
  assertValidWidth(width);

  const strategy = options.strategy ?? "optimal";
  const align = options.align ?? "left";

  const partition = PARTITIONERS[strategy](words, width);

  return {
    lines: renderPartition(words, partition, width, align),
    partition,
    badness: partitionBadness(words, partition, width),
    oversizedWords: words.filter((word) => word.length > width),
  };
}

export {
  lineBadness,
  measureSpan,
  partitionBadness,
  spanBadness,
} from "./badness.js";
export { assertValidWidth, InvalidWidthError } from "./errors.js";
export { computeGreedyPartition } from "./greedy.js";
export {
  buildOptimalPartitionTable,
  computeOptimalPartition,
  type OptimalPartitionTable,
} from "./optimal.js";
export { renderLine, renderPartition } from "./render.js";
export { splitWords } from "./words.js";
export { JUSTIFY_STRATEGIES, LINE_ALIGNMENTS } from "./types.js";
export type {
  JustifyOptions,
  JustifyResult,
  JustifyStrategy,
  LineAlignment,
  LineSpan,
  Partition,
  Word,
  WordSequence,
} from "./types.js";
