/**
 * Output rendering helpers
 */

import { WIRE_FIELD_ORDER, encodeIndexDescription } from "@idxmeta/sdk";
import type { IndexDescription } from "@idxmeta/sdk";
import type { CliIo } from "./io.js";

type Color = "red" | "green" | "yellow";

/**
 * Print lines to stdout (one per line)
 */
export function printLines(io: CliIo, lines: readonly string[]): void {
  lines.forEach((line) => io.stdout(`${line}\n`));
}

/**
 * Apply ANSI color only if the target stream is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * One-line summary of how much of the dataset an index covers
 */
export function formatCoverage(description: IndexDescription): string {
  const indexed = description.getNumIndexedRows();
  const unindexed = description.getNumUnindexedRows();
  if (indexed === undefined || unindexed === undefined) {
    return "coverage unknown";
  }

  const total = indexed + unindexed;
  const summary = `indexed ${indexed} of ${total} rows`;

  // Counts are unchecked; only a positive total of non-negative counts gets a share
  if (total <= 0n || indexed < 0n || unindexed < 0n) {
    return summary;
  }

  const basisPoints = (indexed * 10000n) / total;
  const percent = (Number(basisPoints) / 100).toFixed(2);
  return `${summary} (${percent}%)`;
}

/**
 * Field-by-field differences between two descriptions, keyed by wire name.
 * Absent renders as null. Empty when the descriptions are equal.
 */
export function formatDifferences(left: IndexDescription, right: IndexDescription): string[] {
  const a = encodeIndexDescription(left, { absent: "null" });
  const b = encodeIndexDescription(right, { absent: "null" });

  const lines: string[] = [];
  for (const field of WIRE_FIELD_ORDER) {
    const before = a[field] ?? null;
    const after = b[field] ?? null;
    if (before !== after) {
      lines.push(`${field}: ${String(before)} -> ${String(after)}`);
    }
  }
  return lines;
}
