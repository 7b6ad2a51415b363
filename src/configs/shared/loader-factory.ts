import process from "node:process";

import { isMissing, readUtf8File } from "../../utils/fs.js";

export type ReadFileFn = (path: string) => string;

export interface BaseConfigLoaderOptions {
  root?: string;
  filePath?: string;
  readFile?: ReadFileFn;
}

export interface ConfigLoaderContext<TOptions extends BaseConfigLoaderOptions> {
  root: string;
  filePath: string;
  options: Readonly<TOptions>;
}

export interface ConfigLoaderFactorySpec<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
> {
  resolveFilePath: (root: string, options: Readonly<TOptions>) => string;
  handleMissing: (context: ConfigLoaderContext<TOptions>) => TResult;
  parse: (content: string, context: ConfigLoaderContext<TOptions>) => TResult;
}

export type ConfigLoader<TOptions extends BaseConfigLoaderOptions, TResult> = (
  options: TOptions,
) => TResult;

export function createConfigLoader<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
>(
  spec: ConfigLoaderFactorySpec<TResult, TOptions>,
): ConfigLoader<TOptions, TResult> {
  return (options) => {
    const root = options.root ?? process.cwd();
    const filePath = spec.resolveFilePath(root, options);
    const context: ConfigLoaderContext<TOptions> = {
      root,
      filePath,
      options,
    };

    const readFile = options.readFile ?? readUtf8File;

    let content: string;
    try {
      content = readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        return spec.handleMissing(context);
      }
      throw error;
    }

    return spec.parse(content, context);
  };
}
