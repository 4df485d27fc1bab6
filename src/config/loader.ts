/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { BorgkeepConfig } from "../types/index.js";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults.js";
import { resolvePaths } from "./resolver.js";
import { ConfigError, validateConfig } from "./validator.js";

export { ConfigError } from "./validator.js";

export const CONFIG_FILE_NAMES = [
  "borgkeep.config.yaml",
  "borgkeep.config.yml",
  "borgkeep.config.json",
];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<BorgkeepConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf-8");
  const ext = path.extname(absolutePath).toLowerCase();

  const parsed = parseConfigContent(content, ext);
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge(DEFAULT_CONFIG, parsed);

  validateConfig(merged);

  return resolvePaths(merged, absolutePath);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<BorgkeepConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create borgkeep.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
