/**
 * Retention policy validation
 */

import type { RetentionConfig, RetentionMode } from "../../types/index.js";
import { isValidDuration } from "../../utils/duration.js";
import { EmptyRetentionPolicyError, InvalidDurationError } from "../errors.js";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const COUNT_RULES = [
  "keepHourly",
  "keepDaily",
  "keepWeekly",
  "keepMonthly",
  "keepYearly",
] as const;

export const DURATION_RULES = ["keepWithin", "keepLast", "keepFilesModifiedWithin"] as const;

export type CountRule = (typeof COUNT_RULES)[number];
export type DurationRule = (typeof DURATION_RULES)[number];

/**
 * Whether any rule in the policy can keep an archive in the given mode.
 * Zero counts keep nothing; the file mtime rule only applies per file.
 */
export function hasEffectiveRule(policy: RetentionConfig, mode: RetentionMode): boolean {
  const hasCount = COUNT_RULES.some((rule) => (policy[rule] ?? 0) > 0);
  const hasDuration =
    policy.keepWithin !== undefined ||
    policy.keepLast !== undefined ||
    (mode === "per_file" && policy.keepFilesModifiedWithin !== undefined);
  return hasCount || hasDuration;
}

export function validateRetentionPolicy(
  policy: RetentionConfig,
  mode: RetentionMode,
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const rule of COUNT_RULES) {
    const value = policy[rule];
    if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
      errors.push(`${rule} must be a non-negative integer`);
    }
  }

  for (const rule of DURATION_RULES) {
    const value = policy[rule];
    if (value !== undefined && !isValidDuration(value)) {
      errors.push(`${rule} has invalid duration "${value}"`);
    }
  }

  if (mode === "standard" && policy.keepFilesModifiedWithin !== undefined) {
    warnings.push("keepFilesModifiedWithin only applies to per_file repositories and is ignored");
  }

  if (!hasEffectiveRule(policy, mode)) {
    errors.push("no retention rule can keep any archive");
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Reject a policy before any archive is evaluated or deleted
 */
export function assertRetentionPolicy(policy: RetentionConfig, mode: RetentionMode): void {
  for (const rule of DURATION_RULES) {
    const value = policy[rule];
    if (value !== undefined && !isValidDuration(value)) {
      throw new InvalidDurationError(value);
    }
  }

  if (!hasEffectiveRule(policy, mode)) {
    throw new EmptyRetentionPolicyError();
  }
}
