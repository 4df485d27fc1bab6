/**
 * Archive and metadata type definitions
 */

/**
 * Decoded form of an archive comment. Optional fields are absent on
 * records written by older formats, never defaulted.
 */
export interface ArchiveMetadata {
  sourcePath: string;
  size?: number;
  contentHash?: string;
  sourceDir?: string;
}

/**
 * Archive store's view of one archive
 */
export interface ArchiveRecord {
  name: string;
  createdAt: Date;
  /** null when the comment is empty or could not be read */
  metadata: ArchiveMetadata | null;
  /** The comment could not be read from the store */
  unreadable?: boolean;
  /**
   * Modification time of the single file the archive contains.
   * undefined until fetched, null when the fetch failed.
   */
  fileMtime?: Date | null;
}

/**
 * A file considered for a per-file backup
 */
export interface FileCandidate {
  path: string;
  size: number;
  mtime: Date;
  /** SHA-256 of the file bytes, computed only in paranoid mode */
  contentHash?: string;
  /** Source path the file was collected from */
  sourceDir?: string;
}

export type ArchiveDecision =
  | { action: "skip"; archiveName: string }
  | { action: "create"; archiveName: string }
  | { action: "create-versioned"; archiveName: string; version: number };
