import process from "node:process";

import { isMissing, readUtf8File } from "../../utils/fs.js";

export type ReadFileFn = (path: string) => string;

export interface BaseConfigLoaderOptions {
  root?: string;
  filePath?: string;
}

export interface ConfigLoaderContext<TOptions extends BaseConfigLoaderOptions> {
  root: string;
  filePath: string;
  options: Readonly<TOptions>;
}

export interface ConfigLoaderDefinition<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
> {
  resolveFilePath: (root: string, options: Readonly<TOptions>) => string;
  selectReadFile?: (options: Readonly<TOptions>) => ReadFileFn | undefined;
  handleMissing: (context: ConfigLoaderContext<TOptions>) => TResult;
  parse: (content: string, context: ConfigLoaderContext<TOptions>) => TResult;
}

export type ConfigLoader<TOptions extends BaseConfigLoaderOptions, TResult> = (
  options?: TOptions,
) => TResult;

export function createConfigLoader<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
>(
  definition: ConfigLoaderDefinition<TResult, TOptions>,
): ConfigLoader<TOptions, TResult> {
  return (optionsArg) => {
    const options = (optionsArg ?? {}) as Readonly<TOptions>;
    const root = options.root ?? process.cwd();
    const context: ConfigLoaderContext<TOptions> = {
      root,
      filePath: definition.resolveFilePath(root, options),
      options,
    };

    const readFile = definition.selectReadFile?.(options) ?? defaultReadFile;

    let content: string;
    try {
      content = readFile(context.filePath);
    } catch (error) {
      if (isMissing(error)) {
        return definition.handleMissing(context);
      }
      throw error;
    }

    return definition.parse(content, context);
  };
}

function defaultReadFile(path: string): string {
  return readUtf8File(path, "utf8");
}
