/**
 * Index description value type
 *
 * Describes one index defined over a dataset: its algorithm, its distance
 * metric (vector indexes only) and how many rows it covers.
 *
 * Invariants:
 * - Every field is independently optional; `undefined` means unknown or
 *   inapplicable and is distinct from `0n` and `""`
 * - Instances are frozen once built
 * - equals() and hashCode() are derived from the same field list, in the
 *   same order, so equal descriptions always hash identically
 * - Values are carried as given; nothing is validated here
 */

/**
 * Plain field snapshot of a description
 */
export interface IndexDescriptionFields {
  /** Distance metric, e.g. "l2", "cosine", "dot" */
  distanceType?: string;
  /** Index algorithm, e.g. "IVF_PQ", "BTREE", "BITMAP", "HNSW" */
  indexType?: string;
  /** Rows covered by the index */
  numIndexedRows?: bigint;
  /** Rows not yet covered by the index */
  numUnindexedRows?: bigint;
}

type FieldName = keyof IndexDescriptionFields;

/**
 * Field declaration order. Equality, hashing and rendering all walk this list.
 */
export const INDEX_DESCRIPTION_FIELDS: readonly FieldName[] = [
  "distanceType",
  "indexType",
  "numIndexedRows",
  "numUnindexedRows",
];

/**
 * 31-polynomial over UTF-16 code units, truncated to 32 bits
 */
function hashString(value: string): number {
  let h = 0;
  for (let i = 0; i < value.length; i++) {
    h = (Math.imul(31, h) + value.charCodeAt(i)) | 0;
  }
  return h;
}

/**
 * Fold a 64-bit integer into 32 bits (low word XOR high word)
 */
function hashInt64(value: bigint): number {
  const bits = BigInt.asUintN(64, value);
  const lo = Number(bits & 0xffffffffn);
  const hi = Number(bits >> 32n);
  return (lo ^ hi) | 0;
}

function hashField(value: string | bigint | undefined): number {
  if (value === undefined) return 0;
  return typeof value === "string" ? hashString(value) : hashInt64(value);
}

/**
 * Sole way into the private constructor, assigned by the class below and
 * only reachable from this module
 */
let createDescription: (fields: IndexDescriptionFields) => IndexDescription;

/**
 * Immutable description of an index and its coverage statistics
 */
export class IndexDescription {
  readonly #distanceType: string | undefined;
  readonly #indexType: string | undefined;
  readonly #numIndexedRows: bigint | undefined;
  readonly #numUnindexedRows: bigint | undefined;

  private constructor(fields: IndexDescriptionFields) {
    this.#distanceType = fields.distanceType;
    this.#indexType = fields.indexType;
    this.#numIndexedRows = fields.numIndexedRows;
    this.#numUnindexedRows = fields.numUnindexedRows;
    Object.freeze(this);
  }

  /**
   * Start a new builder
   */
  static builder(): IndexDescriptionBuilder {
    return new IndexDescriptionBuilder();
  }

  static {
    createDescription = (fields) => new IndexDescription(fields);
  }

  /**
   * Distance metric used by the index ("l2", "cosine", "dot").
   * Only applicable to vector indexes.
   */
  getDistanceType(): string | undefined {
    return this.#distanceType;
  }

  /**
   * Index algorithm ("IVF_PQ", "BTREE", "BITMAP", "HNSW")
   */
  getIndexType(): string | undefined {
    return this.#indexType;
  }

  /**
   * Number of rows covered by this index
   */
  getNumIndexedRows(): bigint | undefined {
    return this.#numIndexedRows;
  }

  /**
   * Number of dataset rows not covered by this index
   */
  getNumUnindexedRows(): bigint | undefined {
    return this.#numUnindexedRows;
  }

  /**
   * Copy of the fields, with absent fields left out
   */
  toFields(): IndexDescriptionFields {
    const out: IndexDescriptionFields = {};
    if (this.#distanceType !== undefined) out.distanceType = this.#distanceType;
    if (this.#indexType !== undefined) out.indexType = this.#indexType;
    if (this.#numIndexedRows !== undefined) out.numIndexedRows = this.#numIndexedRows;
    if (this.#numUnindexedRows !== undefined) out.numUnindexedRows = this.#numUnindexedRows;
    return out;
  }

  #get(field: FieldName): string | bigint | undefined {
    switch (field) {
      case "distanceType":
        return this.#distanceType;
      case "indexType":
        return this.#indexType;
      case "numIndexedRows":
        return this.#numIndexedRows;
      case "numUnindexedRows":
        return this.#numUnindexedRows;
    }
  }

  /**
   * Field-wise comparison. Absent only equals absent.
   */
  equals(other: unknown): boolean {
    if (this === other) return true;
    if (!(other instanceof IndexDescription)) return false;
    return INDEX_DESCRIPTION_FIELDS.every((field) => this.#get(field) === other.#get(field));
  }

  /**
   * 32-bit hash over all fields; absent contributes 0
   */
  hashCode(): number {
    let result = 1;
    for (const field of INDEX_DESCRIPTION_FIELDS) {
      result = (Math.imul(31, result) + hashField(this.#get(field))) | 0;
    }
    return result;
  }

  toString(): string {
    const parts = INDEX_DESCRIPTION_FIELDS.map((field) => {
      const value = this.#get(field);
      return `${field}=${value === undefined ? "null" : String(value)}`;
    });
    return `IndexDescription{${parts.join(", ")}}`;
  }
}

/**
 * Mutable, single-owner accumulator for {@link IndexDescription}.
 *
 * Setters overwrite; passing `undefined` clears a field. build() snapshots the
 * current state and leaves the builder usable.
 */
export class IndexDescriptionBuilder {
  #fields: IndexDescriptionFields = {};

  distanceType(distanceType: string | undefined): this {
    this.#fields.distanceType = distanceType;
    return this;
  }

  indexType(indexType: string | undefined): this {
    this.#fields.indexType = indexType;
    return this;
  }

  numIndexedRows(numIndexedRows: bigint | undefined): this {
    this.#fields.numIndexedRows = numIndexedRows;
    return this;
  }

  numUnindexedRows(numUnindexedRows: bigint | undefined): this {
    this.#fields.numUnindexedRows = numUnindexedRows;
    return this;
  }

  build(): IndexDescription {
    return createDescription({ ...this.#fields });
  }
}
