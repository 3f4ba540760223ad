import { resolve } from "node:path";

import { ZodError } from "zod";

import {
  parseYamlDocument,
  type YamlParseErrorDetail,
} from "../../utils/yaml-reader.js";
import { createConfigLoader, type ReadFileFn } from "../shared/loader-factory.js";
import { formatYamlErrorMessage } from "../shared/yaml-error-formatter.js";
import {
  CleanupConfigError,
  CleanupConfigYamlError,
  DEFAULT_CLEANUP_CONFIG_ERROR_CONTEXT,
  MissingCleanupConfigError,
} from "./errors.js";
import { type CleanupConfig, cleanupConfigSchema } from "./types.js";

export const CLEANUP_CONFIG_FILENAME = ".cache-cleanup.yaml" as const;

export interface LoadCleanupConfigOptions {
  root?: string;
  /** Explicit path; unlike the implicit file it must exist. */
  filePath?: string;
  readFile?: ReadFileFn;
}

export function readCleanupConfig(
  content: string,
  displayPath?: string,
): CleanupConfig {
  const parsed = parseYamlDocument(content, {
    formatError: (detail: YamlParseErrorDetail) =>
      new CleanupConfigYamlError(
        formatYamlErrorMessage(detail, {
          context: DEFAULT_CLEANUP_CONFIG_ERROR_CONTEXT,
          displayPath,
        }),
      ),
  });

  try {
    return cleanupConfigSchema.parse(parsed);
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const field = issue && issue.path.length > 0 ? issue.path.join(".") : "";
      const detail = issue?.message ?? "invalid mapping";
      const location = displayPath ? `: ${displayPath}` : "";
      throw new CleanupConfigError(
        `${DEFAULT_CLEANUP_CONFIG_ERROR_CONTEXT}${location}: ${field ? `${field}: ` : ""}${detail}`,
      );
    }
    throw error;
  }
}

const cleanupConfigLoader = createConfigLoader<
  CleanupConfig,
  LoadCleanupConfigOptions
>({
  resolveFilePath: (root, options) =>
    resolve(root, options.filePath ?? CLEANUP_CONFIG_FILENAME),
  selectReadFile: (options) => options.readFile,
  handleMissing: ({ filePath, options }) => {
    if (options.filePath) {
      throw new MissingCleanupConfigError(filePath);
    }
    return {};
  },
  parse: (content, { filePath }) => readCleanupConfig(content, filePath),
});

export function loadCleanupConfig(
  options: LoadCleanupConfigOptions = {},
): CleanupConfig {
  return cleanupConfigLoader(options);
}
