/**
 * Backup module exports
 */

export {
  buildCandidate,
  candidateMetadata,
  createFileArchive,
  createStandardArchive,
} from "./archive-creator.js";
export { collectFiles, createExcludeMatcher, type ExcludeMatcher } from "./file-collector.js";
export {
  type ChangeStatus,
  compareWithArchive,
  type DecideOptions,
  decideArchive,
  findRecordsForPath,
  nextVersion,
} from "./fingerprint.js";
export { ensureRepository, runBackup } from "./orchestrator.js";
export { removeSources } from "./source-remover.js";
