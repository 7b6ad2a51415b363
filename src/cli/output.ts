import {
  formatAlertMessage,
  formatErrorMessage,
  formatLines,
} from "../utils/output.js";

export type AlertSeverity = "info" | "warn" | "error";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  /** Written to stdout verbatim, one entry per line. */
  readonly lines?: readonly string[];
  readonly alerts?: readonly Alert[];
  readonly stderr?: string | readonly string[];
  readonly exitCode?: number;
}

/** Alerts of every severity go to stderr; stdout holds only the lines. */
export function writeCommandOutput(payload: CommandOutputPayload): void {
  for (const alert of payload.alerts ?? []) {
    process.stderr.write(formatAlert(alert));
  }

  for (const entry of normalizeToArray(payload.stderr)) {
    process.stderr.write(entry.endsWith("\n") ? entry : `${entry}\n`);
  }

  const body = formatLines(payload.lines ?? []);
  if (body.length > 0) {
    process.stdout.write(body);
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function formatAlert(alert: Alert): string {
  let formatted: string;

  switch (alert.severity) {
    case "error":
      formatted = formatErrorMessage(alert.message);
      break;
    case "warn":
      formatted = formatAlertMessage("Warning", "yellow", alert.message);
      break;
    case "info":
      formatted = formatAlertMessage("Info", "cyan", alert.message);
      break;
  }

  return `${formatted}\n`;
}

function normalizeToArray(
  value: string | readonly string[] | undefined,
): readonly string[] {
  if (value === undefined) {
    return [] as const;
  }
  if (typeof value === "string") {
    return [value] as const;
  }
  return value;
}
