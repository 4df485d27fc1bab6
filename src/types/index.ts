/**
 * Centralized type exports
 */

// Archive types
export type { ArchiveDecision, ArchiveMetadata, ArchiveRecord, FileCandidate } from "./archive.js";
// Backup types
export type {
  BackupOptions,
  BackupResult,
  CollectedFile,
  CollectFilesResult,
  FileBackupFailure,
  FileBackupOutcome,
} from "./backup.js";
// Config types
export type {
  BorgkeepConfig,
  EncryptionMode,
  RepositoryConfig,
  ResolvedRepository,
  RetentionConfig,
  RetentionMode,
  SourceConfig,
} from "./config.js";
// Retention types
export type {
  DeletionCandidate,
  KeepReason,
  KeptArchive,
  PruneError,
  PruneGroupSummary,
  PruneOptions,
  PruneResult,
  RetentionDecision,
} from "./retention.js";
// Store types
export type {
  ArchiveListing,
  CreateArchiveOptions,
  FileEntry,
  IArchiveStore,
} from "./store.js";
