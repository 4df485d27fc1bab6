/**
 * Archive store module exports
 */

import type { IArchiveStore, ResolvedRepository } from "../types/index.js";
import { BorgArchiveStore } from "./borg.js";

export {
  BorgArchiveStore,
  parseArchiveListing,
  parseBorgTime,
  parseFileEntries,
} from "./borg.js";
export type { DecodedComment } from "./metadata.js";
export {
  decodeComment,
  decodeMetadata,
  encodeMetadata,
  isVerifiableMetadata,
  METADATA_DELIMITER,
} from "./metadata.js";
export { loadArchiveRecords, resolveFileMtime } from "./records.js";

/**
 * Create the archive store for a resolved repository
 */
export function createArchiveStore(repository: ResolvedRepository, borgPath?: string): IArchiveStore {
  return new BorgArchiveStore({
    repositoryPath: repository.path,
    passphrase: repository.passphrase,
    borgPath,
  });
}
