import { formatCalendarDate } from "../../artifacts/dates.js";
import type {
  CleanupRemovalRecord,
  CleanupResult,
} from "../../commands/cleanup/types.js";

const LOG_PREFIX = "[CLEANUP]";

type CliWriter = Pick<NodeJS.WriteStream, "write">;

export interface CleanupRendererOptions {
  stdout?: CliWriter;
}

export interface CleanupRenderer {
  removal(record: CleanupRemovalRecord): void;
  complete(result: CleanupResult): string;
}

export function formatRemovalLine(record: CleanupRemovalRecord): string {
  return `${LOG_PREFIX} ${record.path} -> dated ${formatCalendarDate(record.date)} (${record.ageDays} days old)`;
}

export function formatCleanupSummary(result: CleanupResult): string {
  if (result.status === "missing-root") {
    return `${LOG_PREFIX} Directory ${result.root} does not exist. Nothing to do.`;
  }

  const dryRunLabel = result.dryRun ? "yes" : "no";
  return `${LOG_PREFIX} Completed scanning ${result.root}. Removed ${result.removedCount} file(s). Dry-run: ${dryRunLabel}.`;
}

/**
 * Writes one line per removal as it happens, then the summary line. Lines are
 * plain text so the output can be grepped by maintenance jobs.
 */
export function createCleanupRenderer(
  options: CleanupRendererOptions = {},
): CleanupRenderer {
  const stdout: CliWriter = options.stdout ?? process.stdout;

  return {
    removal(record) {
      stdout.write(`${formatRemovalLine(record)}\n`);
    },
    complete(result) {
      const summary = formatCleanupSummary(result);
      stdout.write(`${summary}\n`);
      return summary;
    },
  };
}
