/**
 * Archive naming utilities
 */

import * as path from "node:path";
import { computePathHash } from "./crypto.js";

// Pattern: repo-file-hash12-YYYY-MM-DD_HH-MM-SS[-vN] (per-file archives)
export const FILE_ARCHIVE_NAME_PATTERN =
  /^(.+)-([0-9a-f]{12})-(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})(?:-v(\d+))?$/;

const VERSION_SUFFIX_PATTERN = /-v(\d+)$/;

export interface ParsedFileArchiveName {
  /** Repository label and file name, joined by "-" */
  label: string;
  pathHash: string;
  timestamp: string;
  /** 1 for the unsuffixed archive */
  version: number;
}

/**
 * Replace anything outside [A-Za-z0-9._-] so the name is safe for the store
 */
export function sanitizeName(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, "_");
}

/**
 * UTC timestamp in YYYY-MM-DD_HH-MM-SS form
 */
export function formatArchiveTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)}_${iso.slice(11, 19).replace(/:/g, "-")}`;
}

export function generateArchiveName(repository: string, now: Date = new Date()): string {
  return `${sanitizeName(repository)}-${formatArchiveTimestamp(now)}`;
}

export function generateFileArchiveName(
  repository: string,
  filePath: string,
  now: Date = new Date(),
): string {
  const base = sanitizeName(path.basename(filePath));
  return `${sanitizeName(repository)}-${base}-${computePathHash(filePath)}-${formatArchiveTimestamp(now)}`;
}

export function withVersionSuffix(archiveName: string, version: number): string {
  return version > 1 ? `${archiveName}-v${version}` : archiveName;
}

/**
 * Version encoded in an archive name's "-vN" suffix (1 when there is none)
 */
export function parseArchiveVersion(archiveName: string): number {
  const match = VERSION_SUFFIX_PATTERN.exec(archiveName);
  return match?.[1] ? Number.parseInt(match[1], 10) : 1;
}

export function parseFileArchiveName(archiveName: string): ParsedFileArchiveName | null {
  const match = FILE_ARCHIVE_NAME_PATTERN.exec(archiveName);
  if (!match) return null;

  const [, label, pathHash, timestamp, version] = match;
  if (label === undefined || pathHash === undefined || timestamp === undefined) return null;

  return {
    label,
    pathHash,
    timestamp,
    version: version ? Number.parseInt(version, 10) : 1,
  };
}

/**
 * Whether an archive name carries the path-hash fragment of the given file
 */
export function isArchiveForPath(archiveName: string, filePath: string): boolean {
  return archiveName.includes(`-${computePathHash(filePath)}-`);
}
