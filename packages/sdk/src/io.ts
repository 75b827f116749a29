/**
 * Reading and writing description files
 *
 * A description file holds one wire record, an array of them, or an object
 * with an `indexes` array.
 *
 * Invariants:
 * - Reads are UTF-8 only; missing files throw DescriptionFileNotFoundError
 * - Writes are atomic: write to a sibling temp file, then rename
 * - Temp files are removed on failure paths
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { dirname, basename, join, resolve } from "node:path";
import { WIRE_FIELD_ORDER } from "./contracts/index.js";
import { encodeIndexDescription, parseJsonText, safeDecodeIndexDescription } from "./codec.js";
import type { IndexDescription } from "./index-description.js";
import {
  DescriptionFileNotFoundError,
  DescriptionFileReadError,
  DescriptionFileWriteError,
  IndexDescriptionDecodeError,
} from "./errors.js";
import type { DecodeIssue } from "./errors.js";
import { stableStringify } from "./format.js";
import { logger } from "./observability/logs.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split parsed file content into the records it holds
 */
function recordsOf(content: unknown): { records: unknown[]; listed: boolean } {
  if (Array.isArray(content)) {
    return { records: content, listed: true };
  }
  if (isRecord(content) && Array.isArray(content.indexes)) {
    return { records: content.indexes, listed: true };
  }
  return { records: [content], listed: false };
}

/**
 * Read every description held in a file
 * @param filePath - Path to a JSON description file
 * @returns Descriptions in file order
 */
export async function readIndexDescriptions(filePath: string): Promise<IndexDescription[]> {
  const absolute = resolve(filePath);

  let text: string;
  try {
    text = await fs.readFile(absolute, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new DescriptionFileNotFoundError(absolute, { cause: err });
    }
    throw new DescriptionFileReadError(absolute, { cause: err });
  }

  const source = `file ${absolute}`;
  const { records, listed } = recordsOf(parseJsonText(text, source));

  const descriptions: IndexDescription[] = [];
  const issues: DecodeIssue[] = [];
  records.forEach((record, position) => {
    const result = safeDecodeIndexDescription(record, source);
    if (result.success) {
      descriptions.push(result.data);
      return;
    }
    issues.push(
      ...(listed
        ? result.error.issues.map((issue) => prefixIssue(issue, `[${position}]`))
        : result.error.issues)
    );
  });

  if (issues.length > 0) {
    throw new IndexDescriptionDecodeError(issues, source);
  }

  logger.debug("descriptions.read", {
    file: absolute,
    details: { count: descriptions.length },
  });
  return descriptions;
}

function prefixIssue(issue: DecodeIssue, prefix: string): DecodeIssue {
  return { path: issue.path ? `${prefix}.${issue.path}` : prefix, message: issue.message };
}

/**
 * Atomically write descriptions as canonical JSON.
 * One description is written as an object, anything else as an array.
 */
export async function writeIndexDescriptions(
  filePath: string,
  descriptions: readonly IndexDescription[]
): Promise<void> {
  const absolute = resolve(filePath);
  const records = descriptions.map((description) => encodeIndexDescription(description));
  const content = stableStringify(records.length === 1 ? records[0] : records, 2, WIRE_FIELD_ORDER);

  const dir = dirname(absolute);
  const tmp = join(dir, `.${basename(absolute)}.${randomUUID()}.tmp`);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(tmp, content, "utf8");
    await fs.rename(tmp, absolute);
  } catch (err) {
    await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
      logger.warn("descriptions.write.cleanup", {
        file: tmp,
        message: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr),
      });
    });
    throw new DescriptionFileWriteError(absolute, { cause: err });
  }

  logger.debug("descriptions.write", {
    file: absolute,
    details: { count: descriptions.length },
  });
}
