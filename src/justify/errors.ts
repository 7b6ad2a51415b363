import { HintedError } from "../utils/errors.js";

export class InvalidWidthError extends HintedError {
  public readonly width: number;

  constructor(width: number) {
    super(`Line length must be a positive integer, got ${width}.`, {
      hintLines: ["Pass a line length of at least 1."],
    });
    this.name = "InvalidWidthError";
    this.width = width;
  }
}

export function assertValidWidth(width: number): void {
  if (!Number.isSafeInteger(width) || width < 1) {
    throw new InvalidWidthError(width);
  }
}
