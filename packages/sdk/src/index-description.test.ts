import { describe, it, expect } from "vitest";
import { IndexDescription, IndexDescriptionBuilder } from "./index-description.js";
import type { IndexDescriptionFields } from "./index-description.js";

const FULL: Required<IndexDescriptionFields> = {
  distanceType: "cosine",
  indexType: "IVF_PQ",
  numIndexedRows: 1000n,
  numUnindexedRows: 0n,
};

/**
 * Every present/absent combination of the four fields
 */
function allCombinations(): IndexDescriptionFields[] {
  const combos: IndexDescriptionFields[] = [];
  for (let mask = 0; mask < 16; mask++) {
    combos.push({
      distanceType: mask & 1 ? FULL.distanceType : undefined,
      indexType: mask & 2 ? FULL.indexType : undefined,
      numIndexedRows: mask & 4 ? FULL.numIndexedRows : undefined,
      numUnindexedRows: mask & 8 ? FULL.numUnindexedRows : undefined,
    });
  }
  return combos;
}

function buildFrom(fields: IndexDescriptionFields): IndexDescription {
  const builder = IndexDescription.builder();
  if (fields.distanceType !== undefined) builder.distanceType(fields.distanceType);
  if (fields.indexType !== undefined) builder.indexType(fields.indexType);
  if (fields.numIndexedRows !== undefined) builder.numIndexedRows(fields.numIndexedRows);
  if (fields.numUnindexedRows !== undefined) builder.numUnindexedRows(fields.numUnindexedRows);
  return builder.build();
}

describe("IndexDescription", () => {
  describe("accessors", () => {
    it("should return every field set on the builder (all four present)", () => {
      const desc = buildFrom(FULL);
      expect(desc.getDistanceType()).toBe("cosine");
      expect(desc.getIndexType()).toBe("IVF_PQ");
      expect(desc.getNumIndexedRows()).toBe(1000n);
      expect(desc.getNumUnindexedRows()).toBe(0n);
    });

    it("should return absent for every field when nothing is set", () => {
      const desc = IndexDescription.builder().build();
      expect(desc.getDistanceType()).toBeUndefined();
      expect(desc.getIndexType()).toBeUndefined();
      expect(desc.getNumIndexedRows()).toBeUndefined();
      expect(desc.getNumUnindexedRows()).toBeUndefined();
    });

    it("should round-trip every present/absent combination", () => {
      for (const fields of allCombinations()) {
        const desc = buildFrom(fields);
        expect(desc.getDistanceType()).toBe(fields.distanceType);
        expect(desc.getIndexType()).toBe(fields.indexType);
        expect(desc.getNumIndexedRows()).toBe(fields.numIndexedRows);
        expect(desc.getNumUnindexedRows()).toBe(fields.numUnindexedRows);
      }
    });

    it("should keep zero and empty string distinct from absent", () => {
      const desc = IndexDescription.builder().distanceType("").numIndexedRows(0n).build();
      expect(desc.getDistanceType()).toBe("");
      expect(desc.getNumIndexedRows()).toBe(0n);
      expect(desc.equals(IndexDescription.builder().build())).toBe(false);
    });

    it("should carry values without validating them", () => {
      const desc = IndexDescription.builder()
        .indexType("BTREE")
        .distanceType("hamming-ish")
        .numIndexedRows(-5n)
        .numUnindexedRows(9223372036854775807n)
        .build();
      expect(desc.getDistanceType()).toBe("hamming-ish");
      expect(desc.getNumIndexedRows()).toBe(-5n);
      expect(desc.getNumUnindexedRows()).toBe(9223372036854775807n);
    });

    it("should return only present fields from toFields", () => {
      const desc = IndexDescription.builder().indexType("BITMAP").numUnindexedRows(3n).build();
      expect(desc.toFields()).toEqual({ indexType: "BITMAP", numUnindexedRows: 3n });
    });
  });

  describe("immutability", () => {
    it("should be frozen", () => {
      const desc = buildFrom(FULL);
      expect(Object.isFrozen(desc)).toBe(true);
    });

    it("should not be affected by edits to a toFields copy", () => {
      const desc = buildFrom(FULL);
      const fields = desc.toFields();
      fields.indexType = "HNSW";
      expect(desc.getIndexType()).toBe("IVF_PQ");
    });

    it("should expose no static factory besides builder", () => {
      expect(Object.getOwnPropertyNames(IndexDescription).filter((name) => name !== "builder").sort()).toEqual([
        "length",
        "name",
        "prototype",
      ]);
      expect("fromFields" in IndexDescription).toBe(false);
    });
  });

  describe("equals", () => {
    it("should equal an independently built description with the same values", () => {
      expect(buildFrom(FULL).equals(buildFrom(FULL))).toBe(true);
    });

    it("should treat two all-absent descriptions as equal", () => {
      const a = IndexDescription.builder().build();
      const b = IndexDescription.builder().build();
      expect(a.equals(b)).toBe(true);
      expect(a.equals(buildFrom(FULL))).toBe(false);
      expect(buildFrom(FULL).equals(a)).toBe(false);
    });

    it("should differ when only numUnindexedRows differs", () => {
      const a = buildFrom({ ...FULL, numUnindexedRows: 5n });
      const b = buildFrom({ ...FULL, numUnindexedRows: 10n });
      expect(a.equals(b)).toBe(false);
      expect(b.equals(a)).toBe(false);
    });

    it("should be reflexive, symmetric and transitive across combinations", () => {
      const combos = allCombinations();
      for (const fa of combos) {
        const a = buildFrom(fa);
        const a2 = buildFrom(fa);
        const a3 = buildFrom(fa);
        expect(a.equals(a)).toBe(true);
        expect(a.equals(a2)).toBe(true);
        expect(a2.equals(a3)).toBe(true);
        expect(a.equals(a3)).toBe(true);

        for (const fb of combos) {
          const b = buildFrom(fb);
          expect(a.equals(b)).toBe(b.equals(a));
          expect(a.equals(b)).toBe(fa === fb);
        }
      }
    });

    it("should not equal values of other types", () => {
      const desc = buildFrom(FULL);
      expect(desc.equals(null)).toBe(false);
      expect(desc.equals(undefined)).toBe(false);
      expect(desc.equals({ ...FULL })).toBe(false);
      expect(desc.equals(desc.toString())).toBe(false);
    });
  });

  describe("hashCode", () => {
    it("should hash equal descriptions identically", () => {
      for (const fields of allCombinations()) {
        expect(buildFrom(fields).hashCode()).toBe(buildFrom(fields).hashCode());
      }
    });

    it("should be stable across calls", () => {
      const desc = buildFrom(FULL);
      const first = desc.hashCode();
      expect(desc.hashCode()).toBe(first);
      expect(desc.hashCode()).toBe(first);
    });

    it("should give the all-absent description a fixed hash", () => {
      expect(IndexDescription.builder().build().hashCode()).toBe(31 ** 4);
    });

    it("should combine field hashes in declaration order", () => {
      // "l2" hashes to 108 * 31 + 50 = 3398
      const desc = IndexDescription.builder().distanceType("l2").build();
      expect(desc.hashCode()).toBe((31 + 3398) * 31 ** 3);
    });

    it("should fold 64-bit counts into 32 bits", () => {
      const minusOne = IndexDescription.builder().numIndexedRows(-1n).build();
      const absent = IndexDescription.builder().build();
      // -1 folds to 0, the same contribution as absent
      expect(minusOne.hashCode()).toBe(absent.hashCode());
      expect(minusOne.equals(absent)).toBe(false);

      const big = IndexDescription.builder().numIndexedRows(2n ** 40n).build();
      expect(Number.isInteger(big.hashCode())).toBe(true);
      expect(big.hashCode()).toBeGreaterThanOrEqual(-(2 ** 31));
      expect(big.hashCode()).toBeLessThan(2 ** 31);
    });

    it("should stay a 32-bit integer for long strings", () => {
      const desc = IndexDescription.builder().indexType("IVF_HNSW_SQ".repeat(50)).build();
      const hash = desc.hashCode();
      expect(hash | 0).toBe(hash);
    });
  });

  describe("toString", () => {
    it("should name every field and its value", () => {
      expect(buildFrom(FULL).toString()).toBe(
        "IndexDescription{distanceType=cosine, indexType=IVF_PQ, numIndexedRows=1000, numUnindexedRows=0}"
      );
    });

    it("should mark absent fields explicitly", () => {
      expect(IndexDescription.builder().indexType("BTREE").build().toString()).toBe(
        "IndexDescription{distanceType=null, indexType=BTREE, numIndexedRows=null, numUnindexedRows=null}"
      );
    });

    it("should be used by template literals", () => {
      const desc = IndexDescription.builder().build();
      expect(`${desc}`).toBe(desc.toString());
    });
  });
});

describe("IndexDescriptionBuilder", () => {
  it("should return itself from every setter", () => {
    const builder = IndexDescription.builder();
    expect(builder).toBeInstanceOf(IndexDescriptionBuilder);
    expect(builder.distanceType("l2")).toBe(builder);
    expect(builder.indexType("HNSW")).toBe(builder);
    expect(builder.numIndexedRows(1n)).toBe(builder);
    expect(builder.numUnindexedRows(2n)).toBe(builder);
  });

  it("should keep only the last value for a repeated setter", () => {
    const desc = IndexDescription.builder()
      .indexType("BTREE")
      .indexType("BITMAP")
      .numIndexedRows(10n)
      .numIndexedRows(20n)
      .build();
    expect(desc.getIndexType()).toBe("BITMAP");
    expect(desc.getNumIndexedRows()).toBe(20n);
  });

  it("should clear a field when set to undefined", () => {
    const desc = IndexDescription.builder().distanceType("dot").distanceType(undefined).build();
    expect(desc.getDistanceType()).toBeUndefined();
  });

  it("should produce equal but independent descriptions on repeated build", () => {
    const builder = IndexDescription.builder().indexType("IVF_PQ").distanceType("l2");
    const first = builder.build();
    const second = builder.build();
    expect(first).not.toBe(second);
    expect(first.equals(second)).toBe(true);
    expect(first.hashCode()).toBe(second.hashCode());
  });

  it("should not alter earlier builds when reused", () => {
    const builder = IndexDescription.builder().indexType("IVF_PQ").numIndexedRows(100n);
    const first = builder.build();

    builder.indexType("HNSW").numIndexedRows(200n).numUnindexedRows(7n);
    const second = builder.build();

    expect(first.getIndexType()).toBe("IVF_PQ");
    expect(first.getNumIndexedRows()).toBe(100n);
    expect(first.getNumUnindexedRows()).toBeUndefined();
    expect(second.getIndexType()).toBe("HNSW");
    expect(first.equals(second)).toBe(false);
  });

  it("should be order independent", () => {
    const a = IndexDescription.builder().numUnindexedRows(1n).indexType("BTREE").build();
    const b = IndexDescription.builder().indexType("BTREE").numUnindexedRows(1n).build();
    expect(a.equals(b)).toBe(true);
  });
});
