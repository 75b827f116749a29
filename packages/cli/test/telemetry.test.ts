/**
 * Unit tests for timing metrics
 */

import { describe, it, expect } from "vitest";
import { emitMetric, withTiming } from "../src/lib/telemetry.js";
import type { CliIo } from "../src/lib/io.js";

function memoryIo(): CliIo & { err: string[] } {
  const err: string[] = [];
  return {
    err,
    stdout: () => {},
    stderr: (content) => {
      err.push(content);
    },
    stdoutIsTTY: false,
    stderrIsTTY: false,
  };
}

describe("telemetry", () => {
  it("should emit sanitized key=value pairs", () => {
    const io = memoryIo();
    emitMetric(io, "cli.show", { file: "a\nb", count: 2 });
    expect(io.err).toEqual(["metric cli.show file=a b count=2\n"]);
  });

  it("should stay silent when not verbose", async () => {
    const io = memoryIo();
    const result = await withTiming("cli.build", { io, verbose: false }, async () => 42);
    expect(result).toBe(42);
    expect(io.err).toEqual([]);
  });

  it("should record failures and rethrow", async () => {
    const io = memoryIo();
    await expect(
      withTiming("cli.compare", { io, verbose: true }, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(/^metric cli\.compare duration_ms=\d+ success=false\n$/);
  });
});
