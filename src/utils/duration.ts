/**
 * Retention duration parsing ("30d", "4w", "6m", "1y")
 */

import { InvalidDurationError } from "../core/errors.js";

export type DurationUnit = "h" | "d" | "w" | "m" | "y";

export const DURATION_PATTERN = /^(\d+)([hdwmy])$/;

const HOUR = 60 * 60;
const DAY = 24 * HOUR;

// Months and years are fixed spans, not calendar-aware.
export const UNIT_SECONDS: Record<DurationUnit, number> = {
  h: HOUR,
  d: DAY,
  w: 7 * DAY,
  m: 30 * DAY,
  y: 365 * DAY,
};

function isDurationUnit(unit: string): unit is DurationUnit {
  return unit in UNIT_SECONDS;
}

/**
 * Parse a duration string into seconds.
 */
export function parseDuration(input: string): number {
  const match = DURATION_PATTERN.exec(input);
  const amount = match?.[1];
  const unit = match?.[2];

  if (amount === undefined || unit === undefined || !isDurationUnit(unit)) {
    throw new InvalidDurationError(input);
  }

  return Number.parseInt(amount, 10) * UNIT_SECONDS[unit];
}

export function parseDurationMs(input: string): number {
  return parseDuration(input) * 1000;
}

export function isValidDuration(input: string): boolean {
  return DURATION_PATTERN.test(input);
}
