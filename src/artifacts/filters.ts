import { extname } from "node:path";

export const DEFAULT_EXTENSIONS: readonly string[] = [".json"];
export const DEFAULT_SKIP_TOKENS: readonly string[] = ["latest"];

export function normalizeExtension(extension: string): string {
  const lowered = extension.toLowerCase();
  return lowered.startsWith(".") ? lowered : `.${lowered}`;
}

export function normalizeExtensions(
  extensions: readonly string[],
): ReadonlySet<string> {
  return new Set(extensions.map(normalizeExtension));
}

/** Lowercased suffix of a base name, or "" when it has none. */
export function fileSuffix(filename: string): string {
  const suffix = extname(filename);
  return suffix === "." ? "" : suffix.toLowerCase();
}

export function matchesExtension(
  filename: string,
  extensions: ReadonlySet<string>,
): boolean {
  const suffix = fileSuffix(filename);
  return suffix.length > 0 && extensions.has(suffix);
}

export function shouldSkip(
  filename: string,
  skipTokens: readonly string[],
): boolean {
  const lowercaseName = filename.toLowerCase();
  return skipTokens.some((token) =>
    lowercaseName.includes(token.toLowerCase()),
  );
}
