/**
 * Backup orchestration
 */

import * as path from "node:path";
import { ArchiveStoreUnavailableError } from "../errors.js";
import { loadArchiveRecords, resolveFileMtime } from "../../store/records.js";
import type {
  ArchiveRecord,
  BackupOptions,
  BackupResult,
  IArchiveStore,
  ResolvedRepository,
} from "../../types/index.js";
import { formatDuration } from "../../utils/format.js";
import { logger } from "../../utils/logger.js";
import { generateArchiveName } from "../../utils/naming.js";
import { buildCandidate, createFileArchive, createStandardArchive } from "./archive-creator.js";
import { collectFiles } from "./file-collector.js";
import { decideArchive, findRecordsForPath } from "./fingerprint.js";
import { removeSources } from "./source-remover.js";

/**
 * Initialise the repository when it is missing and auto-init is enabled
 */
export async function ensureRepository(
  store: IArchiveStore,
  repository: ResolvedRepository,
): Promise<void> {
  if (!repository.autoInit) return;
  if (await store.exists()) return;

  logger.info(`Repository ${repository.name} does not exist, initializing`);
  await store.init(repository.encryption);
}

function emptyResult(repository: ResolvedRepository, dryRun: boolean): BackupResult {
  return {
    repository: repository.name,
    mode: repository.retentionMode,
    archives: [],
    created: 0,
    versioned: 0,
    skipped: 0,
    outcomes: [],
    failures: [],
    removedSources: [],
    dryRun,
    durationMs: 0,
  };
}

async function runStandardBackup(
  store: IArchiveStore,
  repository: ResolvedRepository,
  options: BackupOptions,
  result: BackupResult,
): Promise<void> {
  const sourcePaths = repository.sources.map((source) => path.resolve(source.path));
  const archiveName = options.archiveName ?? generateArchiveName(repository.name, options.now);

  if (options.dryRun) {
    logger.info(`[DRY RUN] Would create archive ${archiveName}`);
  } else {
    await createStandardArchive(store, repository, archiveName, sourcePaths);
  }

  result.archives.push(archiveName);
  result.created = 1;
}

async function runPerFileBackup(
  store: IArchiveStore,
  repository: ResolvedRepository,
  options: BackupOptions,
  result: BackupResult,
): Promise<void> {
  const { files, missingSources } = await collectFiles(repository.sources, repository.exclude);

  if (missingSources.length > 0) {
    logger.warn(`Skipped ${missingSources.length} missing source(s)`, missingSources);
  }
  if (files.length === 0) {
    throw new Error("No files found to backup");
  }

  logger.info(`Found ${files.length} files to back up in ${repository.name}`);

  const records: ArchiveRecord[] = await loadArchiveRecords(store);

  for (const file of files) {
    try {
      const candidate = await buildCandidate(file, repository.paranoid);

      const latest = findRecordsForPath(records, candidate.path)[0];
      if (latest) await resolveFileMtime(store, latest);

      const decision = decideArchive(candidate, records, {
        repository: repository.name,
        paranoid: repository.paranoid,
        now: options.now,
      });
      result.outcomes.push({ path: candidate.path, decision });

      if (decision.action === "skip") {
        logger.debug(`Unchanged, skipping: ${candidate.path}`);
        result.skipped++;
        continue;
      }

      if (options.dryRun) {
        logger.info(`[DRY RUN] Would create archive ${decision.archiveName}`);
      } else {
        const metadata = await createFileArchive(
          store,
          candidate,
          decision.archiveName,
          repository.compression,
        );
        // Later decisions in this run must see the new archive
        records.push({
          name: decision.archiveName,
          createdAt: options.now ?? new Date(),
          metadata,
          fileMtime: candidate.mtime,
        });
      }

      result.archives.push(decision.archiveName);
      if (decision.action === "create-versioned") {
        result.versioned++;
      } else {
        result.created++;
      }
    } catch (err) {
      if (err instanceof ArchiveStoreUnavailableError) throw err;

      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Failed to back up ${file.absolutePath}: ${message}`);
      result.failures.push({ path: file.absolutePath, error: message });
    }
  }
}

export async function runBackup(
  store: IArchiveStore,
  repository: ResolvedRepository,
  options: BackupOptions = {},
): Promise<BackupResult> {
  const startTime = Date.now();
  const dryRun = options.dryRun ?? false;
  const result = emptyResult(repository, dryRun);

  logger.info(
    `Starting ${repository.retentionMode} backup of ${repository.name}${dryRun ? " (dry run)" : ""}`,
  );

  if (!dryRun) {
    await ensureRepository(store, repository);
  }

  if (repository.retentionMode === "per_file") {
    await runPerFileBackup(store, repository, options, result);
  } else {
    await runStandardBackup(store, repository, options, result);
  }

  if (options.removeSource) {
    if (dryRun) {
      logger.info(`[DRY RUN] Would remove ${repository.sources.length} source(s)`);
    } else if (result.failures.length > 0) {
      logger.warn(
        `Keeping sources of ${repository.name}: ${result.failures.length} file(s) failed to back up`,
      );
    } else {
      result.removedSources = await removeSources(repository.sources);
    }
  }

  result.durationMs = Date.now() - startTime;

  logger.info(
    `Backup of ${repository.name} completed in ${formatDuration(result.durationMs)}: ` +
      `${result.created} created, ${result.versioned} versioned, ${result.skipped} skipped` +
      (result.failures.length > 0 ? `, ${result.failures.length} failed` : ""),
  );

  return result;
}
