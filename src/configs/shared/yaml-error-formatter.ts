import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

export interface FormatYamlErrorOptions {
  /** Prefix such as "Invalid cleanup config". */
  context: string;
  displayPath?: string;
}

/**
 * Formats a YAML parse failure as
 * `context: displayPath (line X, column Y): reason`, leaving out whichever
 * parts are unknown.
 */
export function formatYamlErrorMessage(
  detail: YamlParseErrorDetail,
  options: FormatYamlErrorOptions,
): string {
  const { context, displayPath } = options;
  const message = detail.reason ?? detail.message ?? "unknown error";
  const location =
    typeof detail.line === "number" && typeof detail.column === "number"
      ? ` (line ${detail.line}, column ${detail.column})`
      : "";

  if (displayPath) {
    return `${context}: ${displayPath}${location}: ${message}`;
  }
  return `${context}${location}: ${message}`;
}
