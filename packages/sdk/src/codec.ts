/**
 * Wire codec for index descriptions
 *
 * Maps IndexDescription to and from plain JSON records keyed by the stable
 * external field names (see contracts/index.ts).
 *
 * Invariants:
 * - decode(encode(d)) equals d for every description
 * - A missing key and null both decode to absent
 * - Encoded records contain only the four wire keys
 */

import { z } from "zod";
import {
  JSON_PROPERTY_DISTANCE_TYPE,
  JSON_PROPERTY_INDEX_TYPE,
  JSON_PROPERTY_NUM_INDEXED_ROWS,
  JSON_PROPERTY_NUM_UNINDEXED_ROWS,
  WIRE_FIELD_ORDER,
} from "./contracts/index.js";
import type { IndexDescriptionWire, WireCount } from "./contracts/index.js";
import { IndexDescription } from "./index-description.js";
import { IndexDescriptionDecodeError } from "./errors.js";
import type { DecodeIssue } from "./errors.js";
import { stableStringify } from "./format.js";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const DECIMAL_INTEGER = /^-?\d+$/;

export interface EncodeOptions {
  /** How absent fields are written: left out (default) or as null */
  absent?: "omit" | "null";
}

export interface FormatDescriptionOptions extends EncodeOptions {
  /** Indentation (default: 2) */
  indent?: number;
}

const OptionalStringSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const OptionalCountSchema = z.unknown().transform((value, ctx): bigint | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  // JSON.parse has already rounded integers past 2^53
  if (typeof value === "number" && Number.isInteger(value) && !Number.isSafeInteger(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "integers beyond 2^53 must be sent as decimal strings",
    });
    return z.NEVER;
  }

  let parsed: bigint | undefined;
  if (typeof value === "number" && Number.isInteger(value)) {
    parsed = BigInt(value);
  } else if (typeof value === "string" && DECIMAL_INTEGER.test(value)) {
    parsed = BigInt(value);
  }

  if (parsed === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be an integer or a decimal integer string",
    });
    return z.NEVER;
  }

  if (parsed < INT64_MIN || parsed > INT64_MAX) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must fit in a signed 64-bit integer",
    });
    return z.NEVER;
  }

  return parsed;
});

/**
 * Zod schema for a wire record. Unknown keys are dropped.
 */
export const IndexDescriptionWireSchema = z.object({
  [JSON_PROPERTY_DISTANCE_TYPE]: OptionalStringSchema,
  [JSON_PROPERTY_INDEX_TYPE]: OptionalStringSchema,
  [JSON_PROPERTY_NUM_INDEXED_ROWS]: OptionalCountSchema,
  [JSON_PROPERTY_NUM_UNINDEXED_ROWS]: OptionalCountSchema,
});

function encodeCount(value: bigint): WireCount {
  const asNumber = Number(value);
  return Number.isSafeInteger(asNumber) ? asNumber : value.toString();
}

/**
 * Convert a description into its wire record
 */
export function encodeIndexDescription(
  description: IndexDescription,
  options: EncodeOptions = {}
): IndexDescriptionWire {
  const writeNulls = options.absent === "null";
  const out: IndexDescriptionWire = {};

  const distanceType = description.getDistanceType();
  if (distanceType !== undefined) out.distance_type = distanceType;
  else if (writeNulls) out.distance_type = null;

  const indexType = description.getIndexType();
  if (indexType !== undefined) out.index_type = indexType;
  else if (writeNulls) out.index_type = null;

  const numIndexedRows = description.getNumIndexedRows();
  if (numIndexedRows !== undefined) out.num_indexed_rows = encodeCount(numIndexedRows);
  else if (writeNulls) out.num_indexed_rows = null;

  const numUnindexedRows = description.getNumUnindexedRows();
  if (numUnindexedRows !== undefined) out.num_unindexed_rows = encodeCount(numUnindexedRows);
  else if (writeNulls) out.num_unindexed_rows = null;

  return out;
}

/**
 * Convert zod issues to decode issues, prefixing each path
 */
export function toDecodeIssues(error: z.ZodError, prefix = ""): DecodeIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path
      .map((segment) => (typeof segment === "number" ? `[${segment}]` : segment))
      .join(".");
    return {
      path: prefix && path ? `${prefix}.${path}` : prefix || path,
      message: issue.message,
    };
  });
}

/**
 * Decode a wire record without throwing
 */
export function safeDecodeIndexDescription(
  input: unknown,
  source = "input"
):
  | { success: true; data: IndexDescription }
  | { success: false; error: IndexDescriptionDecodeError } {
  const result = IndexDescriptionWireSchema.safeParse(input);
  if (!result.success) {
    return {
      success: false,
      error: new IndexDescriptionDecodeError(toDecodeIssues(result.error), source, {
        cause: result.error,
      }),
    };
  }

  const wire = result.data;
  const data = IndexDescription.builder()
    .distanceType(wire.distance_type)
    .indexType(wire.index_type)
    .numIndexedRows(wire.num_indexed_rows)
    .numUnindexedRows(wire.num_unindexed_rows)
    .build();
  return { success: true, data };
}

/**
 * Decode a wire record
 * @throws IndexDescriptionDecodeError if the record is malformed
 */
export function decodeIndexDescription(input: unknown, source = "input"): IndexDescription {
  const result = safeDecodeIndexDescription(input, source);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

/**
 * Parse JSON text holding one wire record
 * @throws IndexDescriptionDecodeError on malformed JSON or a malformed record
 */
export function parseIndexDescriptionJson(text: string, source = "input"): IndexDescription {
  return decodeIndexDescription(parseJsonText(text, source), source);
}

/**
 * Parse JSON text, stripping a leading BOM
 * @throws IndexDescriptionDecodeError on malformed JSON
 */
export function parseJsonText(text: string, source = "input"): unknown {
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  try {
    return JSON.parse(cleaned);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new IndexDescriptionDecodeError([{ path: "", message: `malformed JSON (${message})` }], source, {
      cause: err,
    });
  }
}

/**
 * Canonical JSON text of a description's wire record
 */
export function formatIndexDescription(
  description: IndexDescription,
  options: FormatDescriptionOptions = {}
): string {
  return stableStringify(encodeIndexDescription(description, options), options.indent ?? 2, WIRE_FIELD_ORDER);
}
