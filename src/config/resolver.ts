/**
 * Configuration path resolution and repository resolution
 */

import * as path from "node:path";
import type { BorgkeepConfig, ResolvedRepository } from "../types/index.js";
import { DEFAULT_CONFIG, DEFAULT_RETENTION_MODE } from "./defaults.js";
import { ConfigError } from "./validator.js";

/**
 * Resolve relative paths in config to absolute paths
 */
export function resolvePaths(config: BorgkeepConfig, configPath: string): BorgkeepConfig {
  const configDir = path.dirname(path.resolve(configPath));

  if (config.logFile && !path.isAbsolute(config.logFile)) {
    config.logFile = path.resolve(configDir, config.logFile);
  }

  for (const repo of Object.values(config.repositories)) {
    // Remote repositories (user@host:path, ssh://) are left alone
    if (!path.isAbsolute(repo.path) && !repo.path.includes(":")) {
      repo.path = path.resolve(configDir, repo.path);
    }

    for (const source of repo.sources) {
      if (!path.isAbsolute(source.path)) {
        source.path = path.resolve(configDir, source.path);
      }
    }
  }

  return config;
}

/**
 * Resolve every setting of a repository: repository value, then global value, then default.
 * The passphrase falls back to BORG_PASSPHRASE.
 */
export function resolveRepository(
  config: BorgkeepConfig,
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedRepository {
  const repo = config.repositories[name];
  if (!repo) {
    throw new ConfigError(`Repository "${name}" not found`);
  }

  return {
    name,
    path: repo.path,
    passphrase: repo.passphrase ?? env.BORG_PASSPHRASE,
    retentionMode: repo.retentionMode ?? DEFAULT_RETENTION_MODE,
    paranoid: repo.paranoid ?? false,
    compression: repo.compression ?? config.compression ?? DEFAULT_CONFIG.compression,
    encryption: repo.encryption ?? config.encryption ?? DEFAULT_CONFIG.encryption,
    autoInit: repo.autoInit ?? config.autoInit ?? DEFAULT_CONFIG.autoInit,
    allowRemoveSource: repo.allowRemoveSource ?? config.allowRemoveSource ?? false,
    sources: repo.sources,
    retention: repo.retention ?? {},
    exclude: [...(config.exclude ?? []), ...(repo.exclude ?? [])],
  };
}

/**
 * Pick the repositories a command works on: the named one, or all of them
 */
export function selectRepositories(
  config: BorgkeepConfig,
  name: string | undefined,
  all: boolean,
): ResolvedRepository[] {
  const names = Object.keys(config.repositories);

  if (name) return [resolveRepository(config, name)];
  if (all || names.length === 1) return names.map((n) => resolveRepository(config, n));

  throw new ConfigError(
    `Multiple repositories configured (${names.join(", ")}). Use --repository <name> or --all`,
  );
}
