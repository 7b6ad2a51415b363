import { load, YAMLException } from "js-yaml";

import { toErrorMessage } from "./errors.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  line?: number;
  column?: number;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  emptyValue?: unknown;
  formatError: (detail: YamlParseErrorDetail) => TError;
}

const DEFAULT_EMPTY_VALUE = {};

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { emptyValue = DEFAULT_EMPTY_VALUE, formatError } = options;
  const source = content.trim();

  if (source.length === 0) {
    return emptyValue;
  }

  try {
    const document = load(source, { json: false });
    return document ?? emptyValue;
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (error instanceof YAMLException) {
    const { reason, message, mark } = error;
    return {
      reason: reason || undefined,
      message: message || undefined,
      // js-yaml marks are zero-based
      line: Number.isFinite(mark?.line) ? mark.line + 1 : undefined,
      column: Number.isFinite(mark?.column) ? mark.column + 1 : undefined,
    };
  }

  return { message: toErrorMessage(error) };
}
