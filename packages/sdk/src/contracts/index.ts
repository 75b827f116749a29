/**
 * Wire contracts for index descriptions
 */

export const JSON_PROPERTY_DISTANCE_TYPE = "distance_type";
export const JSON_PROPERTY_INDEX_TYPE = "index_type";
export const JSON_PROPERTY_NUM_INDEXED_ROWS = "num_indexed_rows";
export const JSON_PROPERTY_NUM_UNINDEXED_ROWS = "num_unindexed_rows";

/**
 * External field names in declaration order
 */
export const WIRE_FIELD_ORDER = [
  JSON_PROPERTY_DISTANCE_TYPE,
  JSON_PROPERTY_INDEX_TYPE,
  JSON_PROPERTY_NUM_INDEXED_ROWS,
  JSON_PROPERTY_NUM_UNINDEXED_ROWS,
] as const;

export type WireFieldName = (typeof WIRE_FIELD_ORDER)[number];

/**
 * Row counts travel as JSON numbers while they are safe integers and as
 * decimal strings beyond that.
 */
export type WireCount = number | string;

/**
 * Wire record of an index description.
 * A missing key and an explicit null both mean "absent".
 */
export interface IndexDescriptionWire {
  distance_type?: string | null;
  index_type?: string | null;
  num_indexed_rows?: WireCount | null;
  num_unindexed_rows?: WireCount | null;
}

/**
 * Wire invariants:
 *
 * 1. Field names are stable and must never be renamed:
 *    distance_type, index_type, num_indexed_rows, num_unindexed_rows
 *
 * 2. Absence:
 *    - Encoders omit absent fields unless asked to write explicit nulls
 *    - Decoders treat a missing key and null identically
 *    - 0, "" and "0" are values, never absence
 *
 * 3. Counts:
 *    - Signed 64-bit range, no sign or range checks beyond that
 *    - Integer number or decimal string accepted on input
 *
 * 4. Unknown keys are ignored on input and never produced on output
 */
