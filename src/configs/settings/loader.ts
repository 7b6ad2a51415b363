import { resolve } from "node:path";

import { HintedError } from "../../utils/errors.js";
import { parseYamlDocument } from "../../utils/yaml-reader.js";
import {
  type BaseConfigLoaderOptions,
  createConfigLoader,
} from "../shared/loader-factory.js";
import { type JustifySettings, justifySettingsSchema } from "./types.js";

export const SETTINGS_CONFIG_FILENAME = ".justify.yaml" as const;

export type LoadJustifySettingsOptions = BaseConfigLoaderOptions;

export const DEFAULT_SETTINGS: Readonly<JustifySettings> = {
  strategy: "optimal",
  align: "left",
};

export class SettingsError extends HintedError {
  constructor(filePath: string, detail: string) {
    super(`Invalid settings file at ${filePath}: ${detail}`, {
      hintLines: [
        "Fix the file or pass --config with the path to a valid settings file.",
      ],
    });
    this.name = "SettingsError";
  }
}

const justifySettingsLoader = createConfigLoader<
  JustifySettings,
  LoadJustifySettingsOptions
>({
  resolveFilePath: (root, options) =>
    resolve(root, options.filePath ?? SETTINGS_CONFIG_FILENAME),
  handleMissing: () => ({ ...DEFAULT_SETTINGS }),
  parse: (content, context) => {
    const parsed = parseSettingsYaml(content, context);
    return {
      width: parsed.width,
      strategy: parsed.strategy ?? DEFAULT_SETTINGS.strategy,
      align: parsed.align ?? DEFAULT_SETTINGS.align,
    };
  },
});

export function loadJustifySettings(
  options: LoadJustifySettingsOptions = {},
): JustifySettings {
  return justifySettingsLoader(options);
}

function parseSettingsYaml(
  content: string,
  context: { filePath: string },
): Partial<JustifySettings> {
  const document = parseYamlDocument(content, {
    formatError: (detail) => {
      const reason = detail.reason ?? detail.message ?? "Unknown YAML error";
      const location = formatLocation(detail.line, detail.column);
      return new SettingsError(
        context.filePath,
        `${reason.replace(/\s+/gu, " ").trim()}${location}`,
      );
    },
  });

  const result = justifySettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue?.message ? issue.message : "Invalid settings value";
    throw new SettingsError(context.filePath, detail);
  }
  return result.data;
}

function formatLocation(line?: number, column?: number): string {
  if (line === undefined) {
    return "";
  }
  return column !== undefined
    ? ` (line ${line}, column ${column})`
    : ` (line ${line})`;
}
