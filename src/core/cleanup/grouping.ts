/**
 * Retention groups keyed by source directory
 */

import type { ArchiveRecord } from "../../types/index.js";

/**
 * Key for archives that carry no source directory (bare-path and older comments)
 */
export const LEGACY_GROUP: unique symbol = Symbol("legacy");

export type GroupKey = string | typeof LEGACY_GROUP;

export function groupKeyOf(record: ArchiveRecord): GroupKey {
  const sourceDir = record.metadata?.sourceDir;
  return sourceDir ? sourceDir : LEGACY_GROUP;
}

/**
 * Partition records by source directory. Every record lands in exactly one group.
 */
export function groupBySourceDir(records: ArchiveRecord[]): Map<GroupKey, ArchiveRecord[]> {
  const groups = new Map<GroupKey, ArchiveRecord[]>();

  for (const record of records) {
    const key = groupKeyOf(record);
    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }

  return groups;
}

export function describeGroup(key: GroupKey): string {
  return key === LEGACY_GROUP ? "(no source directory)" : key;
}
