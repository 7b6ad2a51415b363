import { resolve } from "node:path";

import { z } from "zod";

import { resolveCliAssetRoot } from "./cli-root.js";
import { isMissing, readUtf8File } from "./fs.js";

const packageVersionSchema = z.object({ version: z.string().trim().min(1) });

let cachedVersion: string | undefined;

export function getJustifyVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  cachedVersion = readPackageVersion() ?? "unknown";
  return cachedVersion;
}

function readPackageVersion(): string | undefined {
  const root = resolveCliAssetRoot();
  if (!root) {
    return undefined;
  }

  let raw: string;
  try {
    raw = readUtf8File(resolve(root, "package.json"));
  } catch (error) {
    if (isMissing(error)) {
      return undefined;
    }
    throw error;
  }

  const parsed = packageVersionSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : undefined;
}
