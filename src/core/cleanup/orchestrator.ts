/**
 * Prune orchestration
 */

import { loadArchiveRecords, resolveFileMtime } from "../../store/records.js";
import type {
  ArchiveRecord,
  DeletionCandidate,
  IArchiveStore,
  PruneOptions,
  PruneResult,
  ResolvedRepository,
  RetentionConfig,
} from "../../types/index.js";
import { logger } from "../../utils/logger.js";
import { ensureRepository } from "../backup/orchestrator.js";
import { ArchiveStoreUnavailableError } from "../errors.js";
import { describeGroup, type GroupKey, groupBySourceDir, LEGACY_GROUP } from "./grouping.js";
import { evaluateRetention } from "./retention.js";
import { assertRetentionPolicy } from "./validator.js";

function partition(
  records: ArchiveRecord[],
  mode: PruneOptions["mode"],
): Map<GroupKey, ArchiveRecord[]> {
  if (mode === "per_file") return groupBySourceDir(records);
  return new Map<GroupKey, ArchiveRecord[]>([[LEGACY_GROUP, records]]);
}

/**
 * Evaluate every retention group independently, then delete the union of
 * their delete sets. A failed delete is recorded and the rest continue.
 */
export async function pruneArchives(
  store: IArchiveStore,
  records: ArchiveRecord[],
  policy: RetentionConfig,
  options: PruneOptions,
): Promise<PruneResult> {
  assertRetentionPolicy(policy, options.mode);

  const now = options.now ?? new Date();
  const dryRun = options.dryRun ?? false;
  const result: PruneResult = {
    totalChecked: records.length,
    totalDeleted: 0,
    totalKept: 0,
    groups: [],
    deletions: [],
    errors: [],
    dryRun,
  };

  const toDelete: DeletionCandidate[] = [];

  for (const [key, groupRecords] of partition(records, options.mode)) {
    const decision = await evaluateRetention(groupRecords, policy, now, {
      mode: options.mode,
      resolveMtime: (record) => resolveFileMtime(store, record),
    });

    logger.debug(
      `Group ${describeGroup(key)}: ${decision.keep.length} kept, ${decision.delete.length} to delete`,
    );

    result.totalKept += decision.keep.length;
    result.groups.push({
      sourceDir: key === LEGACY_GROUP ? null : key,
      total: groupRecords.length,
      kept: decision.keep.length,
      deleted: decision.delete.length,
    });
    toDelete.push(...decision.delete);
  }

  logger.info(`Found ${toDelete.length} archive(s) eligible for pruning in ${store.location}`);

  for (const candidate of toDelete) {
    const archiveName = candidate.record.name;

    if (dryRun) {
      logger.info(`[DRY RUN] Would delete: ${archiveName} (${candidate.reason})`);
      result.deletions.push(candidate);
      continue;
    }

    try {
      await store.delete(archiveName);
      result.totalDeleted++;
      result.deletions.push(candidate);
      logger.info(`Deleted: ${archiveName} (${candidate.reason})`);
    } catch (err) {
      if (err instanceof ArchiveStoreUnavailableError) throw err;

      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to delete ${archiveName}: ${message}`);
      result.errors.push({ archiveName, error: message });
    }
  }

  return result;
}

/**
 * Check the policy, initialise the repository unless this is a dry run,
 * and load its archive records. The records can be pruned more than once
 * (a preview, then the real run) without reading the store again.
 */
export async function loadPruneRecords(
  store: IArchiveStore,
  repository: ResolvedRepository,
  options: { dryRun?: boolean } = {},
): Promise<ArchiveRecord[]> {
  assertRetentionPolicy(repository.retention, repository.retentionMode);

  if (!options.dryRun) {
    await ensureRepository(store, repository);
  }

  const records = await loadArchiveRecords(store);
  logger.info(`Checking ${records.length} archive(s) in ${repository.name}`);
  return records;
}

/**
 * Load a repository's archives and prune them under its retention policy
 */
export async function runPrune(
  store: IArchiveStore,
  repository: ResolvedRepository,
  options: Omit<PruneOptions, "mode"> = {},
): Promise<PruneResult> {
  const records = await loadPruneRecords(store, repository, options);

  return pruneArchives(store, records, repository.retention, {
    ...options,
    mode: repository.retentionMode,
  });
}
