/**
 * Retention policy evaluation for one group of archives.
 *
 * Rules are additive: an archive is kept when any enabled rule keeps it.
 * In per-file evaluation, keepFilesModifiedWithin replaces the count and
 * time rules when it is present.
 */

import type {
  ArchiveRecord,
  DeletionCandidate,
  KeepReason,
  KeptArchive,
  RetentionConfig,
  RetentionDecision,
  RetentionMode,
} from "../../types/index.js";
import { parseDurationMs } from "../../utils/duration.js";
import { logger } from "../../utils/logger.js";
import { assertRetentionPolicy, COUNT_RULES, type CountRule } from "./validator.js";

export type MtimeResolver = (record: ArchiveRecord) => Promise<Date | null>;

export interface EvaluateOptions {
  mode: RetentionMode;
  /** Fetches the contained file's mtime; defaults to the record's cached value */
  resolveMtime?: MtimeResolver;
}

type BucketKeyFn = (date: Date) => string;

/**
 * Get ISO 8601 week number for a date (UTC).
 * Week 1 contains the first Thursday of the year; weeks start on Monday.
 */
export function getISOWeek(date: Date): { year: number; week: number } {
  const d = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

  // Nearest Thursday, with Sunday as day 7
  const dayNum = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - dayNum);

  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  const week = Math.ceil(((d.getTime() - yearStart.getTime()) / 86_400_000 + 1) / 7);

  return { year: d.getUTCFullYear(), week };
}

export const BUCKET_KEYS: Record<CountRule, BucketKeyFn> = {
  keepHourly: (date) => date.toISOString().slice(0, 13),
  keepDaily: (date) => date.toISOString().slice(0, 10),
  keepWeekly: (date) => {
    const { year, week } = getISOWeek(date);
    return `${year}-W${week.toString().padStart(2, "0")}`;
  },
  keepMonthly: (date) => date.toISOString().slice(0, 7),
  keepYearly: (date) => date.toISOString().slice(0, 4),
};

function newestFirst(records: ArchiveRecord[]): ArchiveRecord[] {
  return [...records].sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}

/**
 * Newest archive of each of the first `count` distinct buckets, most recent bucket first
 */
export function selectBucketed(
  sorted: ArchiveRecord[],
  count: number,
  bucketKey: BucketKeyFn,
): ArchiveRecord[] {
  const selected: ArchiveRecord[] = [];
  const seen = new Set<string>();

  for (const record of sorted) {
    if (selected.length >= count) break;

    const key = bucketKey(record.createdAt);
    if (seen.has(key)) continue;

    seen.add(key);
    selected.push(record);
  }

  return selected;
}

class KeepSet {
  private readonly reasons = new Map<ArchiveRecord, KeepReason[]>();

  add(record: ArchiveRecord, reason: KeepReason): void {
    const existing = this.reasons.get(record);
    if (existing) {
      if (!existing.includes(reason)) existing.push(reason);
    } else {
      this.reasons.set(record, [reason]);
    }
  }

  has(record: ArchiveRecord): boolean {
    return this.reasons.has(record);
  }

  split(sorted: ArchiveRecord[], deleteReason: string): RetentionDecision {
    const keep: KeptArchive[] = [];
    const toDelete: DeletionCandidate[] = [];

    for (const record of sorted) {
      const reasons = this.reasons.get(record);
      if (reasons) {
        keep.push({ record, reasons });
      } else {
        toDelete.push({ record, reason: deleteReason });
      }
    }

    return { keep, delete: toDelete };
  }
}

function applyCountAndTimeRules(
  sorted: ArchiveRecord[],
  policy: RetentionConfig,
  now: Date,
  keep: KeepSet,
): void {
  if (policy.keepWithin !== undefined) {
    const window = parseDurationMs(policy.keepWithin);
    for (const record of sorted) {
      if (now.getTime() - record.createdAt.getTime() <= window) {
        keep.add(record, "keepWithin");
      }
    }
  }

  if (policy.keepLast !== undefined) {
    const window = parseDurationMs(policy.keepLast);
    const newest = sorted[0];
    if (newest && now.getTime() - newest.createdAt.getTime() <= window) {
      keep.add(newest, "keepLast");
    }
  }

  for (const rule of COUNT_RULES) {
    const count = policy[rule] ?? 0;
    if (count <= 0) continue;

    for (const record of selectBucketed(sorted, count, BUCKET_KEYS[rule])) {
      keep.add(record, rule);
    }
  }
}

async function applyFileMtimeRule(
  sorted: ArchiveRecord[],
  window: number,
  now: Date,
  resolveMtime: MtimeResolver,
  keep: KeepSet,
): Promise<void> {
  for (const record of sorted) {
    const mtime = record.unreadable ? null : await resolveMtime(record);

    if (mtime === null) {
      logger.warn(`Cannot read file mtime of ${record.name}, keeping it`);
      keep.add(record, "unreadable");
      continue;
    }

    if (now.getTime() - mtime.getTime() <= window) {
      keep.add(record, "keepFilesModifiedWithin");
    }
  }
}

/**
 * Split one group of archives into those to keep and those to delete
 */
export async function evaluateRetention(
  records: ArchiveRecord[],
  policy: RetentionConfig,
  now: Date,
  options: EvaluateOptions,
): Promise<RetentionDecision> {
  assertRetentionPolicy(policy, options.mode);

  const sorted = newestFirst(records);
  const keep = new KeepSet();
  let deleteReason = "not matched by any retention rule";

  if (options.mode === "per_file" && policy.keepFilesModifiedWithin !== undefined) {
    const resolveMtime: MtimeResolver =
      options.resolveMtime ?? ((record) => Promise.resolve(record.fileMtime ?? null));

    await applyFileMtimeRule(
      sorted,
      parseDurationMs(policy.keepFilesModifiedWithin),
      now,
      resolveMtime,
      keep,
    );
    deleteReason = `file modified more than ${policy.keepFilesModifiedWithin} ago`;
  } else {
    applyCountAndTimeRules(sorted, policy, now, keep);
  }

  // Archives whose comment could not be read are never deleted
  for (const record of sorted) {
    if (record.unreadable && !keep.has(record)) {
      logger.warn(`Archive ${record.name} could not be read, keeping it`);
      keep.add(record, "unreadable");
    }
  }

  return keep.split(sorted, deleteReason);
}
