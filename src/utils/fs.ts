import { constants as fsConstants } from "node:fs";
import { access, rm, stat } from "node:fs/promises";

export const { F_OK } = fsConstants;

export function isFileSystemError(
  error: unknown,
): error is NodeJS.ErrnoException & { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof (error as { code?: unknown }).code === "string"
  );
}

export function isMissing(error: unknown): boolean {
  return isFileSystemError(error) && error.code === "ENOENT";
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, F_OK);
    return true;
  } catch {
    return false;
  }
}

const UNRESOLVABLE_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch (error) {
    // Dangling, looping and mid-path-file links resolve to nothing.
    if (isFileSystemError(error) && UNRESOLVABLE_CODES.has(error.code)) {
      return false;
    }
    throw error;
  }
}

export async function safeUnlink(path: string): Promise<void> {
  try {
    await rm(path);
  } catch (error) {
    if (isMissing(error)) {
      return;
    }
    throw error;
  }
}

export { readFileSync as readUtf8File } from "node:fs";
