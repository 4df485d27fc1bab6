/**
 * File collection for per-file backups
 */

import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import picomatch from "picomatch";
import type { CollectedFile, CollectFilesResult, SourceConfig } from "../../types/index.js";
import { logger } from "../../utils/logger.js";

export type ExcludeMatcher = (filePath: string) => boolean;

/**
 * Build a matcher that tests each pattern against the full path and the basename.
 * Dot-files are matched by wildcards.
 */
export function createExcludeMatcher(patterns: string[]): ExcludeMatcher {
  if (patterns.length === 0) return () => false;

  const matchers = patterns.map((pattern) => picomatch(pattern, { dot: true }));
  return (filePath: string) => {
    const base = path.basename(filePath);
    return matchers.some((isMatch) => isMatch(filePath) || isMatch(base));
  };
}

async function walk(
  dirPath: string,
  isExcluded: ExcludeMatcher,
  files: string[],
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Skipping unreadable directory ${dirPath}: ${message}`);
    return;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const entryPath = path.join(dirPath, entry.name);
    if (isExcluded(entryPath)) {
      logger.debug(`Excluded: ${entryPath}`);
      continue;
    }

    if (entry.isDirectory()) {
      await walk(entryPath, isExcluded, files);
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
}

type SourceWalk =
  | { status: "collected"; files: string[] }
  | { status: "missing" }
  | { status: "unsupported" };

async function collectFilesFromSource(
  basePath: string,
  isExcluded: ExcludeMatcher,
): Promise<SourceWalk> {
  let stats;
  try {
    stats = await stat(basePath);
  } catch {
    logger.warn(`Source path does not exist: ${basePath}`);
    return { status: "missing" };
  }

  if (stats.isFile()) {
    return { status: "collected", files: isExcluded(basePath) ? [] : [basePath] };
  }
  if (!stats.isDirectory()) {
    logger.warn(`Source path is neither a file nor a directory, skipping: ${basePath}`);
    return { status: "unsupported" };
  }

  const files: string[] = [];
  await walk(basePath, isExcluded, files);
  return { status: "collected", files };
}

/**
 * Collect every regular file below the given sources.
 * Each file remembers the source it was found under. Sources that are missing
 * or not a file or directory, and directories that cannot be read, are
 * warned about and left out.
 */
export async function collectFiles(
  sources: SourceConfig[],
  exclude: string[] = [],
): Promise<CollectFilesResult> {
  const files: CollectedFile[] = [];
  const sourcePaths: string[] = [];
  const missingSources: string[] = [];
  const skippedSources: string[] = [];
  const seen = new Set<string>();

  for (const source of sources) {
    const basePath = path.resolve(source.path);
    const isExcluded = createExcludeMatcher([...exclude, ...(source.exclude ?? [])]);

    const walked = await collectFilesFromSource(basePath, isExcluded);
    if (walked.status === "missing") {
      missingSources.push(basePath);
      continue;
    }
    if (walked.status === "unsupported") {
      skippedSources.push(basePath);
      continue;
    }

    sourcePaths.push(basePath);
    logger.debug(`Collected ${walked.files.length} files from ${basePath}`);

    for (const absolutePath of walked.files) {
      if (seen.has(absolutePath)) continue;
      seen.add(absolutePath);
      files.push({ absolutePath, sourceDir: basePath });
    }
  }

  return { files, sourcePaths, missingSources, skippedSources };
}
