import { sep } from "node:path";

/**
 * Appends entry names to a directory without normalizing the result, so a
 * `..` that follows a symbolic link keeps resolving through the link.
 */
export function resolvePath(root: string, ...segments: string[]): string {
  return segments.reduce(
    (joined, segment) =>
      joined.endsWith(sep)
        ? `${joined}${segment}`
        : `${joined}${sep}${segment}`,
    root,
  );
}

/**
 * Folds repeated separators and `.` segments and drops any trailing
 * separator. `..` segments are kept as written.
 */
export function normalizeRootForDisplay(value: string): string {
  const absolute = value.startsWith(sep);
  const segments = value
    .split(sep)
    .filter((segment) => segment.length > 0 && segment !== ".");
  const joined = segments.join(sep);
  if (absolute) {
    return `${sep}${joined}`;
  }
  return joined.length > 0 ? joined : ".";
}
