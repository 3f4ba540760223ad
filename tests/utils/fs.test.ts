import { existsSync, symlinkSync } from "node:fs";

import { afterEach, beforeEach, describe, expect, test } from "@jest/globals";

import { isFile, isMissing, safeUnlink } from "../../src/utils/fs.js";
import {
  type ArtifactTree,
  createArtifactTree,
} from "../support/fixtures/artifact-tree.js";

describe("isMissing", () => {
  test("returns true for ENOENT errors", () => {
    const error = new Error("missing") as NodeJS.ErrnoException;
    error.code = "ENOENT";

    expect(isMissing(error)).toBe(true);
  });

  test("returns false for other errors", () => {
    const error = new Error("boom") as NodeJS.ErrnoException;
    error.code = "EACCES";

    expect(isMissing(error)).toBe(false);
    expect(isMissing(new Error("generic"))).toBe(false);
  });
});

describe("filesystem helpers", () => {
  let tree: ArtifactTree;

  beforeEach(() => {
    tree = createArtifactTree("cache-cleanup-fs-");
  });

  afterEach(() => {
    tree.cleanup();
  });

  test("safeUnlink removes an existing file", async () => {
    const filePath = tree.write("a.json");

    await safeUnlink(filePath);

    expect(existsSync(filePath)).toBe(false);
  });

  test("safeUnlink ignores files that are already gone", async () => {
    await expect(safeUnlink(tree.path("gone.json"))).resolves.toBeUndefined();
  });

  test("isFile distinguishes files, directories and missing paths", async () => {
    const filePath = tree.write("dir/a.json");

    await expect(isFile(filePath)).resolves.toBe(true);
    await expect(isFile(tree.path("dir"))).resolves.toBe(false);
    await expect(isFile(tree.path("nope"))).resolves.toBe(false);
  });

  test("isFile treats looping and unresolvable links as non-files", async () => {
    const filePath = tree.write("plain.json");
    const loop = tree.path("loop.json");
    symlinkSync(loop, loop);
    symlinkSync(`${filePath}/child`, tree.path("through-file.json"));

    await expect(isFile(loop)).resolves.toBe(false);
    await expect(isFile(tree.path("through-file.json"))).resolves.toBe(false);
  });
});
