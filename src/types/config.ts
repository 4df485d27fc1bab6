/**
 * Configuration type definitions for borgkeep
 */

export type RetentionMode = "standard" | "per_file";

export type EncryptionMode = "none" | "repokey" | "repokey-blake2" | "keyfile" | "keyfile-blake2";

export interface SourceConfig {
  path: string;
  /** Glob patterns matched against the full path or the basename */
  exclude?: string[];
}

/**
 * Declarative retention policy. Any subset of rules may be present;
 * rules are additive (an archive matching any rule is kept).
 */
export interface RetentionConfig {
  keepHourly?: number;
  keepDaily?: number;
  keepWeekly?: number;
  keepMonthly?: number;
  keepYearly?: number;
  keepWithin?: string;
  keepLast?: string;
  /** per_file mode only; takes precedence over count and time rules */
  keepFilesModifiedWithin?: string;
}

export interface RepositoryConfig {
  path: string;
  passphrase?: string;
  retentionMode?: RetentionMode;
  /** Verify unchanged files by content hash, not only size and mtime */
  paranoid?: boolean;
  compression?: string;
  encryption?: EncryptionMode;
  autoInit?: boolean;
  /** Permit `backup --remove-source` for this repository */
  allowRemoveSource?: boolean;
  sources: SourceConfig[];
  retention?: RetentionConfig;
  exclude?: string[];
}

export interface BorgkeepConfig {
  version: string;
  logFile?: string;
  borgPath?: string;
  compression?: string;
  encryption?: EncryptionMode;
  autoInit?: boolean;
  allowRemoveSource?: boolean;
  exclude?: string[];
  repositories: Record<string, RepositoryConfig>;
}

/**
 * A repository with every setting resolved (repository value, then global value, then default)
 */
export interface ResolvedRepository {
  name: string;
  path: string;
  passphrase?: string;
  retentionMode: RetentionMode;
  paranoid: boolean;
  compression: string;
  encryption: EncryptionMode;
  autoInit: boolean;
  allowRemoveSource: boolean;
  sources: SourceConfig[];
  retention: RetentionConfig;
  exclude: string[];
}
