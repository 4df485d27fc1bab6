/**
 * Archive creation through the archive store
 */

import { stat } from "node:fs/promises";
import { encodeMetadata } from "../../store/metadata.js";
import type {
  ArchiveMetadata,
  CollectedFile,
  FileCandidate,
  IArchiveStore,
  ResolvedRepository,
} from "../../types/index.js";
import { computeFileChecksum } from "../../utils/crypto.js";
import { logger } from "../../utils/logger.js";

/**
 * Stat a collected file into a backup candidate. The content hash is only
 * computed in paranoid mode.
 */
export async function buildCandidate(
  file: CollectedFile,
  paranoid: boolean,
): Promise<FileCandidate> {
  const stats = await stat(file.absolutePath);
  const candidate: FileCandidate = {
    path: file.absolutePath,
    size: stats.size,
    mtime: stats.mtime,
    sourceDir: file.sourceDir,
  };

  if (paranoid) {
    candidate.contentHash = await computeFileChecksum(file.absolutePath);
  }

  return candidate;
}

export function candidateMetadata(candidate: FileCandidate): ArchiveMetadata {
  const metadata: ArchiveMetadata = { sourcePath: candidate.path, size: candidate.size };
  if (candidate.contentHash !== undefined) metadata.contentHash = candidate.contentHash;
  if (candidate.sourceDir !== undefined) metadata.sourceDir = candidate.sourceDir;
  return metadata;
}

/**
 * Store a single file in its own archive, with its metadata as the comment
 */
export async function createFileArchive(
  store: IArchiveStore,
  candidate: FileCandidate,
  archiveName: string,
  compression?: string,
): Promise<ArchiveMetadata> {
  const metadata = candidateMetadata(candidate);

  await store.create({
    archiveName,
    paths: [candidate.path],
    comment: encodeMetadata(metadata),
    compression,
  });

  logger.debug(`Archive created: ${archiveName}`);
  return metadata;
}

/**
 * Store every source path of a repository in one archive
 */
export async function createStandardArchive(
  store: IArchiveStore,
  repository: ResolvedRepository,
  archiveName: string,
  sourcePaths: string[],
): Promise<void> {
  logger.info(`Creating archive ${archiveName} from ${sourcePaths.length} source(s)`);

  await store.create({
    archiveName,
    paths: sourcePaths,
    exclude: [
      ...repository.exclude,
      ...repository.sources.flatMap((source) => source.exclude ?? []),
    ],
    compression: repository.compression,
  });
}
