import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;

let cachedCliRoot: string | undefined;

/** Nearest ancestor of this module holding a package.json. */
export function resolveCliAssetRoot(): string | undefined {
  if (cachedCliRoot) {
    return cachedCliRoot;
  }

  let current = __dirname;
  while (true) {
    if (existsSync(resolveNative(current, PACKAGE_JSON_FILENAME))) {
      cachedCliRoot = current;
      return cachedCliRoot;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
