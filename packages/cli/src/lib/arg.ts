/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a row count argument into a 64-bit integer.
 * Negative values pass; descriptions carry counts unchecked.
 */
export function parseRowCount(value: string): bigint {
  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Row count must be a decimal integer.");
  }

  const parsed = BigInt(trimmed);
  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    throw new InvalidArgumentError("Row count must fit in a signed 64-bit integer.");
  }

  return parsed;
}

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}
