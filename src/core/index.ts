/**
 * Core module exports
 */

// Backup
export {
  collectFiles,
  decideArchive,
  ensureRepository,
  findRecordsForPath,
  removeSources,
  runBackup,
} from "./backup/index.js";

// Cleanup
export {
  evaluateRetention,
  groupBySourceDir,
  LEGACY_GROUP,
  loadPruneRecords,
  pruneArchives,
  runPrune,
  validateRetentionPolicy,
} from "./cleanup/index.js";

// Errors
export {
  ArchiveReadError,
  ArchiveStoreCommandError,
  ArchiveStoreUnavailableError,
  EmptyRetentionPolicyError,
  InvalidDurationError,
  SourceRemovalError,
} from "./errors.js";
