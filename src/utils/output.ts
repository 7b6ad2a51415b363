import { colorize, type TerminalColor } from "./colors.js";

/** Joins output lines, ending every line (the last one included) with `\n`. */
export function formatLines(lines: readonly string[]): string {
  if (lines.length === 0) {
    return "";
  }
  return `${lines.join("\n")}\n`;
}

export function formatAlertMessage(
  label: string,
  color: TerminalColor,
  message: string,
): string {
  const prefix = colorize(`${label}:`, color);
  return `${prefix} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatAlertMessage("Error", "red", message);
}
