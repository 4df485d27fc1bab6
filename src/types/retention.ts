/**
 * Retention evaluation type definitions
 */

import type { ArchiveRecord } from "./archive.js";

export type KeepReason =
  | "keepWithin"
  | "keepLast"
  | "keepHourly"
  | "keepDaily"
  | "keepWeekly"
  | "keepMonthly"
  | "keepYearly"
  | "keepFilesModifiedWithin"
  | "unreadable";

export interface KeptArchive {
  record: ArchiveRecord;
  reasons: KeepReason[];
}

export interface DeletionCandidate {
  record: ArchiveRecord;
  reason: string;
}

export interface RetentionDecision {
  keep: KeptArchive[];
  delete: DeletionCandidate[];
}

export interface PruneOptions {
  mode: "standard" | "per_file";
  dryRun?: boolean;
  now?: Date;
}

export interface PruneGroupSummary {
  /** Source directory, or null for archives without directory metadata */
  sourceDir: string | null;
  total: number;
  kept: number;
  deleted: number;
}

export interface PruneError {
  archiveName: string;
  error: string;
}

export interface PruneResult {
  totalChecked: number;
  totalDeleted: number;
  totalKept: number;
  groups: PruneGroupSummary[];
  deletions: DeletionCandidate[];
  errors: PruneError[];
  dryRun: boolean;
}
