import { ValidationError } from "./errors.js";

export function parsePositiveInteger(
  value: unknown,
  invalidMessage: string,
  nonPositiveMessage?: string,
): number {
  if (typeof value !== "string") {
    throw new ValidationError(invalidMessage);
  }

  const trimmed = value.trim();
  if (!/^\d+$/u.test(trimmed)) {
    throw new ValidationError(invalidMessage);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(nonPositiveMessage ?? invalidMessage);
  }

  return parsed;
}

export function parseWidthArgument(value: string): number {
  return parsePositiveInteger(
    value,
    `Invalid line length format, expected integer, got "${value}".`,
    "Line length must be greater than 0.",
  );
}
