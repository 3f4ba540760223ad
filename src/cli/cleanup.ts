import process from "node:process";

import { Command } from "commander";

import {
  DEFAULT_EXTENSIONS,
  DEFAULT_SKIP_TOKENS,
} from "../artifacts/filters.js";
import {
  clampRetentionDays,
  executeCleanupCommand,
} from "../commands/cleanup/command.js";
import type { CleanupResult } from "../commands/cleanup/types.js";
import { loadCleanupConfig } from "../configs/cleanup/loader.js";
import type { CleanupConfig } from "../configs/cleanup/types.js";
import {
  type CleanupRendererOptions,
  createCleanupRenderer,
} from "../render/transcripts/cleanup.js";
import { parseInteger } from "../utils/validators.js";
import { type Alert, writeCommandOutput } from "./output.js";

export const DEFAULT_RETENTION_DAYS = 5;

export interface CleanupCommandOptions {
  path: string;
  days?: number;
  extensions?: readonly string[];
  skipTokens?: readonly string[];
  dryRun?: boolean;
  configPath?: string;
  cwd?: string;
  clock?: () => Date;
  stdout?: CleanupRendererOptions["stdout"];
}

export interface ResolvedCleanupOptions {
  root: string;
  retentionDays: number;
  extensions: readonly string[];
  skipTokens: readonly string[];
  dryRun: boolean;
}

export interface CleanupCommandResult {
  result: CleanupResult;
  summary: string;
  alerts: Alert[];
}

/**
 * Merges flags over the config file over built-in defaults. Skip tokens
 * given as flags are appended to the configured (or default) list rather
 * than replacing it.
 */
export function resolveCleanupOptions(
  options: CleanupCommandOptions,
  config: CleanupConfig,
): ResolvedCleanupOptions {
  const baseSkipTokens = config.skipTokens ?? DEFAULT_SKIP_TOKENS;

  return {
    root: options.path,
    retentionDays: options.days ?? config.days ?? DEFAULT_RETENTION_DAYS,
    extensions: options.extensions ?? config.extensions ?? DEFAULT_EXTENSIONS,
    skipTokens: [...baseSkipTokens, ...(options.skipTokens ?? [])],
    dryRun: Boolean(options.dryRun),
  };
}

export async function runCleanupCommand(
  options: CleanupCommandOptions,
): Promise<CleanupCommandResult> {
  const config = loadCleanupConfig({
    root: options.cwd ?? process.cwd(),
    filePath: options.configPath,
  });
  const resolved = resolveCleanupOptions(options, config);

  const alerts: Alert[] = [];
  if (clampRetentionDays(resolved.retentionDays) !== resolved.retentionDays) {
    alerts.push({
      severity: "warn",
      message: `Retention window ${resolved.retentionDays} is negative; using 0 days.`,
    });
  }

  const renderer = createCleanupRenderer({ stdout: options.stdout });
  const result = await executeCleanupCommand({
    ...resolved,
    clock: options.clock,
    onRemoval: (record) => renderer.removal(record),
  });
  const summary = renderer.complete(result);

  return { result, summary, alerts };
}

interface CleanupCommandActionOptions {
  path: string;
  days?: number;
  extensions?: string[];
  skipToken: string[];
  dryRun?: boolean;
  config?: string;
}

function parseDaysOption(value: string): number {
  return parseInteger(value, "Expected an integer after --days");
}

function collectSkipToken(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createCleanupCommand(): Command {
  return new Command("cache-cleanup")
    .description("Delete dated files older than N days")
    .requiredOption("--path <dir>", "Target directory to scan")
    .option(
      "--days <n>",
      `Retention window in days; files strictly older are removed (default: ${DEFAULT_RETENTION_DAYS})`,
      parseDaysOption,
    )
    .option(
      "--extensions <ext...>",
      'File extensions to include, case-insensitive (default: ".json")',
    )
    .option(
      "--skip-token <token>",
      'Filename substring to skip; repeatable, added to "latest"',
      collectSkipToken,
      [],
    )
    .option("--dry-run", "Show what would be deleted without removing files")
    .option(
      "--config <file>",
      "YAML file with default days, extensions and skipTokens",
    )
    .addHelpText(
      "after",
      "\nFiles are deleted only when the name carries a YYYYMMDD or YYYY-MM-DD date,\nthe extension matches, and the date is older than the retention window.\n\nExamples:\n  cache-cleanup --path cache --days 5 --extensions .json .csv --skip-token _latest\n  cache-cleanup --path reports --days 5 --extensions .html .json --dry-run",
    )
    .allowExcessArguments(false)
    .action(async (options: CleanupCommandActionOptions) => {
      const { alerts } = await runCleanupCommand({
        path: options.path,
        days: options.days,
        extensions: options.extensions,
        skipTokens: options.skipToken,
        dryRun: options.dryRun,
        configPath: options.config,
      });

      writeCommandOutput({ alerts });
    });
}
