import { existsSync } from "node:fs";
import { join } from "node:path";

import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  jest,
} from "@jest/globals";

import { runCli } from "../../src/bin.js";
import {
  type ArtifactTree,
  createArtifactTree,
} from "../support/fixtures/artifact-tree.js";

describe("cache-cleanup entrypoint", () => {
  let tree: ArtifactTree;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    tree = createArtifactTree("cache-cleanup-bin-");
    stdout = [];
    stderr = [];
    jest
      .spyOn(process.stdout, "write")
      .mockImplementation((chunk: unknown) => {
        stdout.push(String(chunk));
        return true;
      });
    jest
      .spyOn(process.stderr, "write")
      .mockImplementation((chunk: unknown) => {
        stderr.push(String(chunk));
        return true;
      });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    tree.cleanup();
  });

  it("previews removals with --dry-run", async () => {
    const filePath = tree.write("old_20000101.json");
    tree.write("old_latest_20000101.json");

    await runCli([
      "node",
      "cache-cleanup",
      "--path",
      tree.root,
      "--days",
      "5",
      "--dry-run",
    ]);

    expect(stdout).toHaveLength(2);
    expect(stdout[0]).toMatch(
      new RegExp(
        `^\\[CLEANUP\\] ${escapeRegExp(filePath)} -> dated 2000-01-01 \\(\\d+ days old\\)\\n$`,
        "u",
      ),
    );
    expect(stdout[1]).toBe(
      `[CLEANUP] Completed scanning ${tree.root}. Removed 1 file(s). Dry-run: yes.\n`,
    );
    expect(existsSync(filePath)).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it("accepts several extensions and repeated skip tokens", async () => {
    const report = tree.write("reports/report-2000-01-01.HTML");
    const pinned = tree.write("reports/pinned_20000101.csv");
    const keep = tree.write("reports/keep_20000101.json");
    const data = tree.write("reports/data_20000101.csv");

    await runCli([
      "node",
      "cache-cleanup",
      "--path",
      tree.root,
      "--extensions",
      ".html",
      "csv",
      "--skip-token",
      "pinned",
      "--skip-token",
      "KEEP",
    ]);

    expect(existsSync(report)).toBe(false);
    expect(existsSync(data)).toBe(false);
    expect(existsSync(pinned)).toBe(true);
    expect(existsSync(keep)).toBe(true);
    expect(stdout.at(-1)).toBe(
      `[CLEANUP] Completed scanning ${tree.root}. Removed 2 file(s). Dry-run: no.\n`,
    );
  });

  it("exits cleanly when the directory does not exist", async () => {
    const missing = join(tree.root, "nope");

    await runCli(["node", "cache-cleanup", "--path", missing]);

    expect(stdout).toEqual([
      `[CLEANUP] Directory ${missing} does not exist. Nothing to do.\n`,
    ]);
    expect(process.exitCode).toBeUndefined();
  });

  it("lets commander report a missing --path once", async () => {
    await runCli(["node", "cache-cleanup", "--days", "3"]);

    const occurrences =
      stderr.join("").match(/required option '--path <dir>' not specified/gu) ??
      [];
    expect(occurrences).toHaveLength(1);
    expect(process.exitCode).toBe(1);
  });

  it("renders a non-integer --days as an error", async () => {
    await runCli([
      "node",
      "cache-cleanup",
      "--path",
      tree.root,
      "--days",
      "soon",
    ]);

    expect(stderr.join("")).toContain("Expected an integer after --days");
    expect(process.exitCode).toBe(1);
  });

  it("renders config errors with their hint", async () => {
    await runCli([
      "node",
      "cache-cleanup",
      "--path",
      tree.root,
      "--config",
      join(tree.root, "absent.yaml"),
    ]);

    const rendered = stderr.join("");
    expect(rendered).toContain(
      `Missing cleanup config file at ${join(tree.root, "absent.yaml")}.`,
    );
    expect(rendered).toContain(
      "Check the --config path, or omit it to use built-in defaults.",
    );
    expect(process.exitCode).toBe(1);
  });

  it("prints the package version", async () => {
    await runCli(["node", "cache-cleanup", "--version"]);

    expect(stdout).toEqual(["0.1.0\n"]);
    expect(process.exitCode).toBe(0);
  });

  it("reports the missing --path when called without arguments", async () => {
    await runCli(["node", "cache-cleanup"]);

    const occurrences =
      stderr.join("").match(/required option '--path <dir>' not specified/gu) ??
      [];
    expect(occurrences).toHaveLength(1);
    expect(stdout).toEqual([]);
    expect(process.exitCode).toBe(1);
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/gu, "\\$&");
}
