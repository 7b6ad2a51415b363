/** A whitespace-free, non-empty token. Its length is `word.length`. */
export type Word = string;

export type WordSequence = readonly Word[];

/** Contiguous run of words `[start, end)` placed on one output line. */
export interface LineSpan {
  readonly start: number;
  readonly end: number;
}

/** Spans covering every word exactly once, in order. */
export type Partition = readonly LineSpan[];

export const JUSTIFY_STRATEGIES = ["optimal", "greedy"] as const;

export type JustifyStrategy = (typeof JUSTIFY_STRATEGIES)[number];

export const LINE_ALIGNMENTS = ["left", "full"] as const;

/**
 * `left` joins words with single spaces. `full` spreads the slack of every
 * non-final line over its gaps so the line is exactly `width` wide.
 */
export type LineAlignment = (typeof LINE_ALIGNMENTS)[number];

export interface JustifyOptions {
  strategy?: JustifyStrategy;
  align?: LineAlignment;
}

export interface JustifyResult {
  readonly lines: readonly string[];
  readonly partition: Partition;
  /** Sum of `slack^2` over every line but the last; overflow lines count 0. */
  readonly badness: number;
  /** Words longer than the width, in input order. */
  readonly oversizedWords: readonly Word[];
}
