import type { CliError } from "../../cli/errors.js";
import { formatErrorMessage } from "../../utils/output.js";

export function renderCliError(error: CliError): string {
  const lines: string[] = [formatErrorMessage(error.headline)];

  if (error.detailLines.length > 0) {
    lines.push("", ...error.detailLines);
  }

  if (error.hintLines.length > 0) {
    lines.push("", ...error.hintLines);
  }

  return lines.join("\n");
}
