/**
 * Telemetry and observability helpers
 */

import type { CliIo } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line to stderr
 */
export function emitMetric(io: CliIo, key: string, fields: Record<string, unknown>): void {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  io.stderr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics, emitted only when verbose
 */
export async function withTiming<T>(
  label: string,
  options: { io: CliIo; verbose: boolean },
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (options.verbose) {
      emitMetric(options.io, label, {
        duration_ms: Date.now() - start,
        success,
      });
    }
  }
}
