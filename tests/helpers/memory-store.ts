import { statSync } from "node:fs";
import { ArchiveStoreCommandError, ArchiveStoreUnavailableError } from "../../src/core/errors.js";
import type {
  ArchiveListing,
  CreateArchiveOptions,
  EncryptionMode,
  FileEntry,
  IArchiveStore,
} from "../../src/types/index.js";

export interface MemoryArchive {
  name: string;
  createdAt: Date;
  comment: string;
  entries: FileEntry[];
  paths: string[];
}

export interface SeedArchive {
  name: string;
  createdAt: Date;
  comment?: string;
  /** mtime of the single file the archive holds */
  fileMtime?: Date;
  size?: number;
}

/**
 * In-process archive store for tests. Archives keep insertion order.
 * Like a missing Borg repository, an uninitialised store only answers
 * exists(), init() and version().
 */
export class MemoryArchiveStore implements IArchiveStore {
  readonly location: string;
  readonly archives: MemoryArchive[] = [];
  readonly deleted: string[] = [];
  readonly extracted: { archiveName: string; destination: string; path?: string }[] = [];
  initialized: boolean;
  initEncryption: EncryptionMode | null = null;

  /** Archive names whose comment read fails */
  readonly unreadableComments = new Set<string>();
  /** Archive names whose file listing fails */
  readonly unreadableEntries = new Set<string>();
  /** Archive names whose delete fails */
  readonly failingDeletes = new Set<string>();
  /** Paths whose create fails */
  readonly failingCreates = new Set<string>();

  /** Clock used for archives created through create() */
  now: () => Date = () => new Date();

  constructor(location = "/backups/test-repo", initialized = true) {
    this.location = location;
    this.initialized = initialized;
  }

  seed(archive: SeedArchive): this {
    const entries: FileEntry[] = archive.fileMtime
      ? [{ path: "file", size: archive.size ?? 0, mtime: archive.fileMtime }]
      : [];
    this.archives.push({
      name: archive.name,
      createdAt: archive.createdAt,
      comment: archive.comment ?? "",
      entries,
      paths: [],
    });
    return this;
  }

  names(): string[] {
    return this.archives.map((a) => a.name);
  }

  async exists(): Promise<boolean> {
    return this.initialized;
  }

  async init(encryption: EncryptionMode): Promise<void> {
    this.initialized = true;
    this.initEncryption = encryption;
  }

  async create(options: CreateArchiveOptions): Promise<void> {
    this.assertInitialized();
    if (this.archives.some((a) => a.name === options.archiveName)) {
      throw new ArchiveStoreCommandError(["create", options.archiveName], 2, "Archive already exists");
    }
    for (const p of options.paths) {
      if (this.failingCreates.has(p)) {
        throw new ArchiveStoreCommandError(["create", options.archiveName], 2, `cannot read ${p}`);
      }
    }

    // Entries are captured as the files are at archive time, without the leading slash
    const entries: FileEntry[] = [];
    for (const p of options.paths) {
      const stats = statSync(p);
      if (stats.isFile()) {
        entries.push({ path: p.replace(/^\/+/, ""), size: stats.size, mtime: stats.mtime });
      }
    }

    this.archives.push({
      name: options.archiveName,
      createdAt: this.now(),
      comment: options.comment ?? "",
      entries,
      paths: options.paths,
    });
  }

  async listNames(): Promise<string[]> {
    this.assertInitialized();
    return this.names();
  }

  async listArchives(): Promise<ArchiveListing[]> {
    this.assertInitialized();
    return this.archives.map((a) => ({ name: a.name, createdAt: a.createdAt }));
  }

  async readComment(archiveName: string): Promise<string> {
    this.assertInitialized();
    if (this.unreadableComments.has(archiveName)) {
      throw new ArchiveStoreCommandError(["info", archiveName], 2, "integrity error");
    }
    return this.find(archiveName).comment;
  }

  async listFileEntries(archiveName: string): Promise<FileEntry[]> {
    this.assertInitialized();
    if (this.unreadableEntries.has(archiveName)) {
      throw new ArchiveStoreCommandError(["list", archiveName], 2, "integrity error");
    }
    return this.find(archiveName).entries;
  }

  async delete(archiveName: string): Promise<void> {
    this.assertInitialized();
    if (this.failingDeletes.has(archiveName)) {
      throw new ArchiveStoreCommandError(["delete", archiveName], 2, "lock timeout");
    }
    const index = this.archives.findIndex((a) => a.name === archiveName);
    if (index === -1) {
      throw new ArchiveStoreCommandError(["delete", archiveName], 1, "Archive does not exist");
    }
    this.archives.splice(index, 1);
    this.deleted.push(archiveName);
  }

  async info(): Promise<string> {
    this.assertInitialized();
    return `Repository: ${this.location}\nArchives: ${this.archives.length}`;
  }

  async extract(archiveName: string, destination: string, path?: string): Promise<void> {
    this.assertInitialized();
    this.find(archiveName);
    this.extracted.push({ archiveName, destination, path });
  }

  async version(): Promise<string> {
    return "memory 1.0";
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new ArchiveStoreUnavailableError(`Repository ${this.location} does not exist`);
    }
  }

  private find(archiveName: string): MemoryArchive {
    const archive = this.archives.find((a) => a.name === archiveName);
    if (!archive) {
      throw new ArchiveStoreCommandError(["show", archiveName], 1, "Archive does not exist");
    }
    return archive;
  }
}
