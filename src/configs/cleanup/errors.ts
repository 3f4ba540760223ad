import { HintedError } from "../../utils/errors.js";

export const DEFAULT_CLEANUP_CONFIG_ERROR_CONTEXT = "Invalid cleanup config";

export class CleanupConfigError extends HintedError {
  constructor(message: string, hintLines: readonly string[] = []) {
    super(message, { hintLines });
    this.name = "CleanupConfigError";
  }
}

export class MissingCleanupConfigError extends CleanupConfigError {
  constructor(public readonly filePath: string) {
    super(`Missing cleanup config file at ${filePath}.`, [
      "Check the --config path, or omit it to use built-in defaults.",
    ]);
    this.name = "MissingCleanupConfigError";
  }
}

export class CleanupConfigYamlError extends CleanupConfigError {
  constructor(message: string) {
    super(message);
    this.name = "CleanupConfigYamlError";
  }
}
