/**
 * Loading archive records from a store
 */

import { ArchiveReadError, ArchiveStoreUnavailableError } from "../core/errors.js";
import type { ArchiveRecord, IArchiveStore } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { decodeMetadata } from "./metadata.js";

/**
 * List every archive with its timestamp and decoded comment.
 * An archive whose comment cannot be read comes back with null metadata
 * and `unreadable` set.
 */
export async function loadArchiveRecords(store: IArchiveStore): Promise<ArchiveRecord[]> {
  const listings = await store.listArchives();
  const records: ArchiveRecord[] = [];

  for (const listing of listings) {
    try {
      const comment = await store.readComment(listing.name);
      records.push({ ...listing, metadata: decodeMetadata(comment) });
    } catch (err) {
      if (err instanceof ArchiveStoreUnavailableError) throw err;

      const readError = new ArchiveReadError(listing.name, { cause: err });
      logger.warn(readError.message);
      records.push({ ...listing, metadata: null, unreadable: true });
    }
  }

  logger.debug(`Loaded ${records.length} archive records from ${store.location}`);
  return records;
}

function stripLeadingSlash(value: string): string {
  return value.replace(/^\/+/, "");
}

/**
 * Fetch (once) the modification time of the file an archive contains.
 * Returns null when the archive cannot be read or holds no file.
 */
export async function resolveFileMtime(
  store: IArchiveStore,
  record: ArchiveRecord,
): Promise<Date | null> {
  if (record.fileMtime !== undefined) return record.fileMtime;

  try {
    const entries = await store.listFileEntries(record.name);
    const sourcePath = record.metadata?.sourcePath;
    const entry =
      (sourcePath !== undefined
        ? entries.find((e) => stripLeadingSlash(e.path) === stripLeadingSlash(sourcePath))
        : undefined) ?? entries[0];

    record.fileMtime = entry?.mtime ?? null;
  } catch (err) {
    if (err instanceof ArchiveStoreUnavailableError) throw err;

    logger.warn(new ArchiveReadError(record.name, { cause: err }).message);
    record.fileMtime = null;
  }

  return record.fileMtime;
}
