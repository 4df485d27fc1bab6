/**
 * Borg archive store
 */

import { spawn } from "node:child_process";
import { access, mkdir } from "node:fs/promises";
import * as path from "node:path";
import { ArchiveStoreCommandError, ArchiveStoreUnavailableError } from "../core/errors.js";
import type {
  ArchiveListing,
  CreateArchiveOptions,
  EncryptionMode,
  FileEntry,
  IArchiveStore,
} from "../types/index.js";
import { logger } from "../utils/logger.js";

export interface BorgStoreOptions {
  repositoryPath: string;
  passphrase?: string;
  borgPath?: string;
}

export interface BorgRunOptions {
  cwd?: string;
}

interface CommandOutput {
  stdout: string;
  stderr: string;
}

const REPOSITORY_MISSING_PATTERN = /Repository \S+ does not exist|is not a valid repository/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string, args: string[]): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ArchiveStoreCommandError(
      args,
      0,
      `unparseable output: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Borg prints local times without an offset, with microseconds
 */
export function parseBorgTime(value: string): Date | null {
  const date = new Date(value.slice(0, 23));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parse `borg list --json` output into archive listings
 */
export function parseArchiveListing(output: unknown): ArchiveListing[] {
  if (!isRecord(output) || !Array.isArray(output.archives)) return [];

  const listings: ArchiveListing[] = [];
  for (const archive of output.archives) {
    if (!isRecord(archive)) continue;
    const name = typeof archive.name === "string" ? archive.name : archive.archive;
    const time = typeof archive.time === "string" ? archive.time : archive.start;
    if (typeof name !== "string" || typeof time !== "string") continue;

    const createdAt = parseBorgTime(time);
    if (createdAt) listings.push({ name, createdAt });
  }
  return listings;
}

/**
 * Parse `borg list --json-lines` output into regular file entries
 */
export function parseFileEntries(output: string): FileEntry[] {
  const entries: FileEntry[] = [];

  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const item: unknown = JSON.parse(line);
    if (!isRecord(item) || item.type !== "-") continue;
    if (typeof item.path !== "string" || typeof item.mtime !== "string") continue;

    const mtime = parseBorgTime(item.mtime);
    if (!mtime) continue;

    entries.push({
      path: item.path,
      size: typeof item.size === "number" ? item.size : 0,
      mtime,
    });
  }
  return entries;
}

export class BorgArchiveStore implements IArchiveStore {
  readonly location: string;
  private readonly borgPath: string;

  constructor(private readonly options: BorgStoreOptions) {
    this.location = options.repositoryPath;
    this.borgPath = options.borgPath ?? "borg";
  }

  async exists(): Promise<boolean> {
    try {
      await access(path.join(this.location, "config"));
      return true;
    } catch {
      return false;
    }
  }

  async init(encryption: EncryptionMode): Promise<void> {
    logger.info(`Initializing repository: ${this.location}`);
    await this.run(["init", `--encryption=${encryption}`, this.location]);
  }

  async create(options: CreateArchiveOptions): Promise<void> {
    const args = ["create"];
    if (options.compression) args.push("--compression", options.compression);
    if (options.comment !== undefined) args.push("--comment", options.comment);
    for (const pattern of options.exclude ?? []) {
      args.push("--exclude", pattern);
    }
    args.push(this.archiveRef(options.archiveName), ...options.paths);

    logger.debug(`Creating archive ${options.archiveName}`, { paths: options.paths });
    await this.run(args);
  }

  async listNames(): Promise<string[]> {
    const { stdout } = await this.run(["list", "--short", this.location]);
    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async listArchives(): Promise<ArchiveListing[]> {
    const args = ["list", "--json", this.location];
    const { stdout } = await this.run(args);
    return parseArchiveListing(parseJson(stdout, args));
  }

  async readComment(archiveName: string): Promise<string> {
    const args = ["info", "--json", this.archiveRef(archiveName)];
    const { stdout } = await this.run(args);
    const output = parseJson(stdout, args);

    if (!isRecord(output) || !Array.isArray(output.archives)) return "";
    const [archive] = output.archives;
    return isRecord(archive) && typeof archive.comment === "string" ? archive.comment : "";
  }

  async listFileEntries(archiveName: string): Promise<FileEntry[]> {
    const args = ["list", "--json-lines", this.archiveRef(archiveName)];
    const { stdout } = await this.run(args);
    try {
      return parseFileEntries(stdout);
    } catch (err) {
      throw new ArchiveStoreCommandError(
        args,
        0,
        `unparseable output: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async delete(archiveName: string): Promise<void> {
    await this.run(["delete", this.archiveRef(archiveName)]);
    logger.debug(`Deleted archive: ${archiveName}`);
  }

  async info(): Promise<string> {
    const { stdout } = await this.run(["info", this.location]);
    return stdout.trim();
  }

  async extract(archiveName: string, destination: string, filePath?: string): Promise<void> {
    await mkdir(destination, { recursive: true });

    const args = ["extract", this.archiveRef(archiveName)];
    // Archived paths are stored without the leading slash
    if (filePath) args.push(filePath.replace(/^\/+/, ""));

    await this.run(args, { cwd: destination });
  }

  async version(): Promise<string> {
    const { stdout } = await this.run(["--version"]);
    return stdout.trim();
  }

  private archiveRef(archiveName: string): string {
    return `${this.location}::${archiveName}`;
  }

  private run(args: string[], runOptions: BorgRunOptions = {}): Promise<CommandOutput> {
    return new Promise((resolve, reject) => {
      const env: NodeJS.ProcessEnv = {
        ...process.env,
        BORG_RELOCATED_REPO_ACCESS_IS_OK: "yes",
        BORG_UNKNOWN_UNENCRYPTED_REPO_ACCESS_IS_OK: "yes",
      };
      if (this.options.passphrase !== undefined) {
        env.BORG_PASSPHRASE = this.options.passphrase;
      }

      const child = spawn(this.borgPath, args, {
        env,
        cwd: runOptions.cwd,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });
      child.on("error", (err) => {
        reject(
          new ArchiveStoreUnavailableError(`Unable to run ${this.borgPath}: ${err.message}`, {
            cause: err,
          }),
        );
      });
      child.on("close", (code) => {
        if (code === 0) {
          resolve({ stdout, stderr });
        } else if (REPOSITORY_MISSING_PATTERN.test(stderr)) {
          reject(
            new ArchiveStoreUnavailableError(
              `Repository ${this.location} is not available: ${stderr.trim()}`,
            ),
          );
        } else {
          reject(new ArchiveStoreCommandError(args, code, stderr.trim()));
        }
      });
    });
  }
}
