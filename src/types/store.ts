/**
 * Archive store interface definitions
 */

import type { EncryptionMode } from "./config.js";

export interface ArchiveListing {
  name: string;
  createdAt: Date;
}

export interface FileEntry {
  path: string;
  size: number;
  mtime: Date;
}

export interface CreateArchiveOptions {
  archiveName: string;
  paths: string[];
  comment?: string;
  exclude?: string[];
  compression?: string;
}

export interface IArchiveStore {
  /** Repository location, used in log lines and errors */
  readonly location: string;

  /**
   * Check whether the repository has been initialised
   */
  exists(): Promise<boolean>;

  /**
   * Initialise the repository
   */
  init(encryption: EncryptionMode): Promise<void>;

  /**
   * Create an archive from one or more paths
   */
  create(options: CreateArchiveOptions): Promise<void>;

  /**
   * Archive names in creation order
   */
  listNames(): Promise<string[]>;

  /**
   * Archive names with creation timestamps, in creation order
   */
  listArchives(): Promise<ArchiveListing[]>;

  readComment(archiveName: string): Promise<string>;

  listFileEntries(archiveName: string): Promise<FileEntry[]>;

  delete(archiveName: string): Promise<void>;

  /**
   * Repository information as printed by the store
   */
  info(): Promise<string>;

  extract(archiveName: string, destination: string, path?: string): Promise<void>;

  /**
   * Version identifier of the store implementation
   */
  version(): Promise<string>;
}
