import type { CalendarDate } from "../../artifacts/dates.js";

export interface CleanupRemovalRecord {
  path: string;
  date: CalendarDate;
  ageDays: number;
}

export type CleanupRemovalHandler = (record: CleanupRemovalRecord) => void;

export interface CleanupCommandInput {
  root: string;
  retentionDays: number;
  extensions: readonly string[];
  skipTokens: readonly string[];
  dryRun?: boolean;
  clock?: () => Date;
  onRemoval?: CleanupRemovalHandler;
}

export interface CleanupCompletedResult {
  status: "completed";
  root: string;
  dryRun: boolean;
  retentionDays: number;
  removedCount: number;
  removed: CleanupRemovalRecord[];
}

export interface CleanupMissingRootResult {
  status: "missing-root";
  root: string;
  dryRun: boolean;
}

export type CleanupResult = CleanupCompletedResult | CleanupMissingRootResult;
