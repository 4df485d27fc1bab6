/**
 * Default configuration values
 */

import type { BorgkeepConfig, RetentionMode } from "../types/index.js";

export const DEFAULT_CONFIG: Required<
  Pick<BorgkeepConfig, "borgPath" | "compression" | "encryption" | "autoInit" | "exclude">
> = {
  // version is intentionally NOT defaulted - it must be specified by the user
  borgPath: "borg",
  compression: "lz4",
  encryption: "repokey",
  autoInit: false,
  exclude: [],
};

export const DEFAULT_RETENTION_MODE: RetentionMode = "standard";

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
