/**
 * Cleanup module exports
 */

export {
  describeGroup,
  type GroupKey,
  groupBySourceDir,
  groupKeyOf,
  LEGACY_GROUP,
} from "./grouping.js";
export { loadPruneRecords, pruneArchives, runPrune } from "./orchestrator.js";
export {
  BUCKET_KEYS,
  type EvaluateOptions,
  evaluateRetention,
  getISOWeek,
  type MtimeResolver,
  selectBucketed,
} from "./retention.js";
export {
  assertRetentionPolicy,
  hasEffectiveRule,
  type ValidationResult,
  validateRetentionPolicy,
} from "./validator.js";
