import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { basename } from "node:path";

import { isFile, isFileSystemError } from "../utils/fs.js";
import { resolvePath } from "../utils/path.js";
import { type CalendarDate, extractDateFromFilename } from "./dates.js";
import { matchesExtension, shouldSkip } from "./filters.js";

export interface CandidateFile {
  readonly path: string;
  readonly date: CalendarDate;
}

export interface GatherCandidatesOptions {
  root: string;
  extensions: ReadonlySet<string>;
  skipTokens: readonly string[];
}

/**
 * Walks `root` depth-first and yields every dated file that passes the
 * extension and skip-token filters. Paths are `root` joined with the entry
 * names below it.
 */
export async function* gatherCandidates(
  options: GatherCandidatesOptions,
): AsyncGenerator<CandidateFile> {
  const { root, extensions, skipTokens } = options;

  for await (const filePath of walkFiles(root)) {
    const name = basename(filePath);
    if (!matchesExtension(name, extensions)) {
      continue;
    }
    if (shouldSkip(name, skipTokens)) {
      continue;
    }
    const date = extractDateFromFilename(name);
    if (!date) {
      continue;
    }
    yield { path: filePath, date };
  }
}

async function* walkFiles(directory: string): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    // A root that names a regular file has nothing to scan.
    if (isFileSystemError(error) && error.code === "ENOTDIR") {
      return;
    }
    throw error;
  }

  for (const entry of entries) {
    const entryPath = resolvePath(directory, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(entryPath);
      continue;
    }
    if (entry.isFile()) {
      yield entryPath;
      continue;
    }
    if (entry.isSymbolicLink() && (await isFile(entryPath))) {
      yield entryPath;
    }
  }
}
