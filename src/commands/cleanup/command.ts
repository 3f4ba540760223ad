import { ageInDays, toLocalCalendarDate } from "../../artifacts/dates.js";
import { normalizeExtensions } from "../../artifacts/filters.js";
import { gatherCandidates } from "../../artifacts/scan.js";
import { pathExists, safeUnlink } from "../../utils/fs.js";
import { normalizeRootForDisplay } from "../../utils/path.js";
import type {
  CleanupCommandInput,
  CleanupRemovalRecord,
  CleanupResult,
} from "./types.js";

export async function executeCleanupCommand(
  input: CleanupCommandInput,
): Promise<CleanupResult> {
  const { clock, onRemoval } = input;
  const root = normalizeRootForDisplay(input.root);
  const dryRun = input.dryRun ?? false;

  if (!(await pathExists(root))) {
    return { status: "missing-root", root, dryRun };
  }

  const retentionDays = clampRetentionDays(input.retentionDays);
  const extensions = normalizeExtensions(input.extensions);
  // Read once so every file is aged against the same day.
  const today = toLocalCalendarDate(clock?.() ?? new Date());

  const removed: CleanupRemovalRecord[] = [];
  for await (const candidate of gatherCandidates({
    root,
    extensions,
    skipTokens: input.skipTokens,
  })) {
    const ageDays = ageInDays(today, candidate.date);
    if (ageDays <= retentionDays) {
      continue;
    }

    const record: CleanupRemovalRecord = {
      path: candidate.path,
      date: candidate.date,
      ageDays,
    };
    onRemoval?.(record);
    if (!dryRun) {
      await safeUnlink(candidate.path);
    }
    removed.push(record);
  }

  return {
    status: "completed",
    root,
    dryRun,
    retentionDays,
    removedCount: removed.length,
    removed,
  };
}

export function clampRetentionDays(days: number): number {
  return Math.max(days, 0);
}
