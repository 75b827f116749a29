/**
 * idxmeta SDK
 *
 * Immutable index descriptions, their wire codec and file helpers
 */

export { IndexDescription, IndexDescriptionBuilder, INDEX_DESCRIPTION_FIELDS } from "./index-description.js";
export type { IndexDescriptionFields } from "./index-description.js";

// Wire contract
export {
  JSON_PROPERTY_DISTANCE_TYPE,
  JSON_PROPERTY_INDEX_TYPE,
  JSON_PROPERTY_NUM_INDEXED_ROWS,
  JSON_PROPERTY_NUM_UNINDEXED_ROWS,
  WIRE_FIELD_ORDER,
} from "./contracts/index.js";
export type { IndexDescriptionWire, WireCount, WireFieldName } from "./contracts/index.js";

// Codec
export {
  IndexDescriptionWireSchema,
  encodeIndexDescription,
  decodeIndexDescription,
  safeDecodeIndexDescription,
  parseIndexDescriptionJson,
  parseJsonText,
  formatIndexDescription,
} from "./codec.js";
export type { EncodeOptions, FormatDescriptionOptions } from "./codec.js";

// Utilities
export { stableStringify } from "./format.js";
export type { KeyOrder } from "./format.js";
export { readIndexDescriptions, writeIndexDescriptions } from "./io.js";
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Errors
export {
  IdxmetaError,
  IndexDescriptionDecodeError,
  DescriptionFileNotFoundError,
  DescriptionFileReadError,
  DescriptionFileWriteError,
} from "./errors.js";
export type { DecodeIssue } from "./errors.js";
