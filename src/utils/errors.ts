export interface HintedErrorOptions {
  readonly detailLines?: readonly string[];
  readonly hintLines?: readonly string[];
}

export class HintedError extends Error {
  public readonly headline: string;
  public readonly detailLines: readonly string[];
  public readonly hintLines: readonly string[];

  constructor(headline: string, options: HintedErrorOptions = {}) {
    const { detailLines, hintLines } = options;
    super(headline);
    this.headline = headline;
    this.detailLines = detailLines ? Array.from(detailLines) : [];
    this.hintLines = hintLines ? Array.from(hintLines) : [];
  }
}

export class ValidationError extends HintedError {
  constructor(message: string, options: HintedErrorOptions = {}) {
    super(message, options);
    this.name = "ValidationError";
  }
}

export function toErrorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message;
}
