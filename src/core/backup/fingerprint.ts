/**
 * Per-file archive decisions: skip an unchanged file, or pick the name of
 * the archive to create for a new or changed one.
 */

import { isVerifiableMetadata } from "../../store/metadata.js";
import type { ArchiveDecision, ArchiveRecord, FileCandidate } from "../../types/index.js";
import {
  generateFileArchiveName,
  isArchiveForPath,
  parseArchiveVersion,
  withVersionSuffix,
} from "../../utils/naming.js";

export interface DecideOptions {
  /** Repository label used as the archive name prefix */
  repository: string;
  /** Compare content hashes in addition to size and mtime */
  paranoid: boolean;
  now?: Date;
}

export type ChangeStatus = "unchanged" | "changed" | "unverifiable";

/**
 * Records whose decoded source path is the candidate's path, newest first
 */
export function findRecordsForPath(records: ArchiveRecord[], filePath: string): ArchiveRecord[] {
  return records
    .filter((record) => record.metadata?.sourcePath === filePath)
    .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

function toSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Compare a candidate with the archive it was last stored in.
 * The archive's fileMtime must already be resolved; an unresolved or
 * unreadable mtime makes the comparison unverifiable.
 */
export function compareWithArchive(
  candidate: FileCandidate,
  record: ArchiveRecord,
  paranoid: boolean,
): ChangeStatus {
  const metadata = record.metadata;
  if (!isVerifiableMetadata(metadata, paranoid)) return "unverifiable";
  if (!record.fileMtime) return "unverifiable";
  if (paranoid && candidate.contentHash === undefined) return "unverifiable";

  if (metadata.size !== candidate.size) return "changed";
  if (toSeconds(record.fileMtime) !== toSeconds(candidate.mtime)) return "changed";
  if (paranoid && metadata.contentHash !== candidate.contentHash) return "changed";

  return "unchanged";
}

/**
 * Next free version number for a file: one past the highest version among
 * its archives (the unsuffixed archive counts as 1), bumped past any name
 * already taken. Derived from names on every call, never stored.
 */
export function nextVersion(
  records: ArchiveRecord[],
  filePath: string,
  baseName: string,
): number {
  const names = new Set(records.map((record) => record.name));

  let highest = 1;
  for (const record of records) {
    const related =
      record.metadata?.sourcePath === filePath || isArchiveForPath(record.name, filePath);
    if (related) highest = Math.max(highest, parseArchiveVersion(record.name));
  }

  let version = highest + 1;
  while (names.has(withVersionSuffix(baseName, version))) {
    version++;
  }
  return version;
}

/**
 * Decide what to do with a file given the archives already in the repository.
 * Any doubt about whether the file changed resolves toward creating an archive.
 */
export function decideArchive(
  candidate: FileCandidate,
  existing: ArchiveRecord[],
  options: DecideOptions,
): ArchiveDecision {
  const now = options.now ?? new Date();
  const baseName = generateFileArchiveName(options.repository, candidate.path, now);
  const matches = findRecordsForPath(existing, candidate.path);
  const latest = matches[0];

  if (!latest) {
    const taken = existing.some((record) => record.name === baseName);
    if (!taken) return { action: "create", archiveName: baseName };

    const version = nextVersion(existing, candidate.path, baseName);
    return {
      action: "create-versioned",
      archiveName: withVersionSuffix(baseName, version),
      version,
    };
  }

  if (compareWithArchive(candidate, latest, options.paranoid) === "unchanged") {
    return { action: "skip", archiveName: latest.name };
  }

  const version = nextVersion(existing, candidate.path, baseName);
  return {
    action: "create-versioned",
    archiveName: withVersionSuffix(baseName, version),
    version,
  };
}
