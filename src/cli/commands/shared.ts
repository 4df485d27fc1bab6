/**
 * Option parsing and setup shared by every command
 */

import { findAndLoadConfig } from "../../config/index.js";
import { createArchiveStore } from "../../store/index.js";
import type { BorgkeepConfig, IArchiveStore, ResolvedRepository } from "../../types/index.js";
import { setLogFile, setLogLevel } from "../../utils/logger.js";

export const COMMON_OPTIONS = {
  config: { type: "string", short: "c" },
  log: { type: "string" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export const REPOSITORY_OPTIONS = {
  repository: { type: "string", short: "r" },
  all: { type: "boolean", default: false },
} as const;

export interface CommonValues {
  config?: string;
  log?: string;
  verbose?: boolean;
}

export interface CommandDeps {
  createStore: (repository: ResolvedRepository, config: BorgkeepConfig) => IArchiveStore;
}

export const defaultDeps: CommandDeps = {
  createStore: (repository, config) => createArchiveStore(repository, config.borgPath),
};

/**
 * Apply --verbose, load the config, then route logs to --log or the configured log file
 */
export async function loadCommandConfig(values: CommonValues): Promise<BorgkeepConfig> {
  if (values.verbose) {
    setLogLevel("debug");
  }
  if (values.log) {
    setLogFile(values.log);
  }

  const config = await findAndLoadConfig(values.config);

  if (!values.log && config.logFile) {
    setLogFile(config.logFile);
  }

  return config;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
