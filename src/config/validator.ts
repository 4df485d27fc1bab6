/**
 * Configuration validation
 */

import { validateRetentionPolicy } from "../core/cleanup/validator.js";
import type { BorgkeepConfig, RetentionConfig, RetentionMode } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { isPlainObject } from "./defaults.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

const ENCRYPTION_MODES = ["none", "repokey", "repokey-blake2", "keyfile", "keyfile-blake2"];
const RETENTION_MODES: RetentionMode[] = ["standard", "per_file"];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function checkOptionalString(value: unknown, field: string): void {
  if (value !== undefined && typeof value !== "string") {
    throw new ConfigError(`${field} must be a string`);
  }
}

function checkOptionalBoolean(value: unknown, field: string): void {
  if (value !== undefined && typeof value !== "boolean") {
    throw new ConfigError(`${field} must be a boolean`);
  }
}

function checkExclude(value: unknown, field: string): void {
  if (value !== undefined && !isStringArray(value)) {
    throw new ConfigError(`${field} must be an array of patterns`);
  }
}

function checkEncryption(value: unknown, field: string): void {
  if (value !== undefined && (typeof value !== "string" || !ENCRYPTION_MODES.includes(value))) {
    throw new ConfigError(`${field} must be one of: ${ENCRYPTION_MODES.join(", ")}`);
  }
}

function isRetentionMode(value: unknown): value is RetentionMode {
  return RETENTION_MODES.some((mode) => mode === value);
}

function readCount(retention: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = retention[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${field}.${key} must be a non-negative integer`);
  }
  return value;
}

function readDuration(retention: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = retention[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${field}.${key} must be a duration string such as "30d"`);
  }
  return value;
}

function readRetention(value: unknown, field: string): RetentionConfig {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${field} must be an object`);
  }

  const retention: RetentionConfig = {};
  const keepHourly = readCount(value, "keepHourly", field);
  const keepDaily = readCount(value, "keepDaily", field);
  const keepWeekly = readCount(value, "keepWeekly", field);
  const keepMonthly = readCount(value, "keepMonthly", field);
  const keepYearly = readCount(value, "keepYearly", field);
  const keepWithin = readDuration(value, "keepWithin", field);
  const keepLast = readDuration(value, "keepLast", field);
  const keepFilesModifiedWithin = readDuration(value, "keepFilesModifiedWithin", field);

  if (keepHourly !== undefined) retention.keepHourly = keepHourly;
  if (keepDaily !== undefined) retention.keepDaily = keepDaily;
  if (keepWeekly !== undefined) retention.keepWeekly = keepWeekly;
  if (keepMonthly !== undefined) retention.keepMonthly = keepMonthly;
  if (keepYearly !== undefined) retention.keepYearly = keepYearly;
  if (keepWithin !== undefined) retention.keepWithin = keepWithin;
  if (keepLast !== undefined) retention.keepLast = keepLast;
  if (keepFilesModifiedWithin !== undefined) {
    retention.keepFilesModifiedWithin = keepFilesModifiedWithin;
  }

  return retention;
}

function validateSources(value: unknown, field: string): void {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`${field} must be a non-empty array`);
  }

  value.forEach((source: unknown, i) => {
    if (!isPlainObject(source)) {
      throw new ConfigError(`${field}[${i}] must be an object`);
    }
    if (!source.path || typeof source.path !== "string") {
      throw new ConfigError(`${field}[${i}].path must be a string`);
    }
    checkExclude(source.exclude, `${field}[${i}].exclude`);
  });
}

function validateRepository(name: string, repo: unknown): void {
  const field = `repositories.${name}`;
  if (!isPlainObject(repo)) {
    throw new ConfigError(`${field} must be an object`);
  }

  if (!repo.path || typeof repo.path !== "string") {
    throw new ConfigError(`${field}.path must be a string`);
  }

  checkOptionalString(repo.passphrase, `${field}.passphrase`);
  checkOptionalString(repo.compression, `${field}.compression`);
  checkOptionalBoolean(repo.paranoid, `${field}.paranoid`);
  checkOptionalBoolean(repo.autoInit, `${field}.autoInit`);
  checkOptionalBoolean(repo.allowRemoveSource, `${field}.allowRemoveSource`);
  checkEncryption(repo.encryption, `${field}.encryption`);
  checkExclude(repo.exclude, `${field}.exclude`);
  validateSources(repo.sources, `${field}.sources`);

  if (repo.retentionMode !== undefined && !isRetentionMode(repo.retentionMode)) {
    throw new ConfigError(`${field}.retentionMode must be one of: ${RETENTION_MODES.join(", ")}`);
  }

  if (repo.retention !== undefined) {
    const mode = isRetentionMode(repo.retentionMode) ? repo.retentionMode : "standard";
    const result = validateRetentionPolicy(readRetention(repo.retention, `${field}.retention`), mode);

    if (!result.valid) {
      throw new ConfigError(`${field}.retention: ${result.errors.join("; ")}`);
    }
    for (const warning of result.warnings) {
      logger.warn(`${field}.retention: ${warning}`);
    }
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  globals: (c) => {
    checkOptionalString(c.logFile, "logFile");
    checkOptionalString(c.borgPath, "borgPath");
    checkOptionalString(c.compression, "compression");
    checkOptionalBoolean(c.autoInit, "autoInit");
    checkOptionalBoolean(c.allowRemoveSource, "allowRemoveSource");
    checkEncryption(c.encryption, "encryption");
    checkExclude(c.exclude, "exclude");
  },

  repositories: (c) => {
    if (!isPlainObject(c.repositories)) {
      throw new ConfigError("Config must have a 'repositories' object with named repositories");
    }
    const entries = Object.entries(c.repositories);
    if (entries.length === 0) {
      throw new ConfigError("Config must have at least one repository");
    }
    for (const [name, repo] of entries) {
      validateRepository(name, repo);
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is BorgkeepConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
