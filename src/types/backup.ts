/**
 * Backup operation type definitions
 */

import type { ArchiveDecision } from "./archive.js";

export interface BackupOptions {
  dryRun?: boolean;
  /** Archive name override for standard mode */
  archiveName?: string;
  /** Delete the repository's sources once every file is safely archived */
  removeSource?: boolean;
  now?: Date;
}

export interface CollectedFile {
  absolutePath: string;
  /** Source path the file was found under */
  sourceDir: string;
}

export interface CollectFilesResult {
  files: CollectedFile[];
  sourcePaths: string[];
  missingSources: string[];
  /** Sources that exist but are neither a regular file nor a directory */
  skippedSources: string[];
}

export interface FileBackupOutcome {
  path: string;
  decision: ArchiveDecision;
}

export interface FileBackupFailure {
  path: string;
  error: string;
}

export interface BackupResult {
  repository: string;
  mode: "standard" | "per_file";
  /** Archives written (or that would be written on a dry run) */
  archives: string[];
  created: number;
  versioned: number;
  skipped: number;
  outcomes: FileBackupOutcome[];
  failures: FileBackupFailure[];
  /** Real paths of sources deleted after the backup */
  removedSources: string[];
  dryRun: boolean;
  durationMs: number;
}
