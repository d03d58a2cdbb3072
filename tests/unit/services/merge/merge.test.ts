import { describe, it, expect } from "vitest";

import { makeDate } from "../../../../src/codec/temporal.js";
import { Dataset } from "../../../../src/dataset/dataset.js";
import { MergeError } from "../../../../src/errors.js";
import { loadSchema } from "../../../../src/schema/registry.js";
import {
  compareValues,
  filterByWindow,
  mergeDatasets,
} from "../../../../src/services/merge/merge.js";
import { flightsSchema, hop } from "../../../fixtures/flights.js";

describe("services/merge", () => {
  const schema = flightsSchema();

  function existing(): Dataset {
    return new Dataset(schema, [
      hop(1, "KL1221", { flight_index: 1, seat: "1A" }),
      hop(2, "KL1223", { flight_index: 2 }),
      hop(3, "KL1225", { flight_index: 3 }),
    ]);
  }

  // ============================================================================
  // Upsert
  // ============================================================================

  describe("upsert", () => {
    it("should append rows sorted by date and number them", () => {
      const result = mergeDatasets(Dataset.empty(schema), [
        hop(5, "KL1229"),
        hop(2, "KL1223"),
      ]);

      expect(result.inserted).toBe(2);
      expect(result.dataset.rows.map((r) => r.flightnum)).toEqual([
        "KL1223",
        "KL1229",
      ]);
      expect(result.dataset.rows.map((r) => r.flight_index)).toEqual([1, 2]);
    });

    it("should replace a row with the same key in place", () => {
      const result = mergeDatasets(existing(), [hop(1, "KL1221", { seat: "2C" })]);

      expect(result).toMatchObject({ inserted: 0, replaced: 1, removed: 0 });
      expect(result.dataset.rows[0]).toMatchObject({ seat: "2C", flight_index: 1 });
      expect(result.dataset.size).toBe(3);
    });

    it("should keep existing rows ahead of appended ones", () => {
      const result = mergeDatasets(existing(), [
        hop(4, "KL1219", { date: "2023-05-30", date_as_dt: makeDate(2023, 5, 30) }),
      ]);

      expect(result.dataset.rows.map((r) => r.flightnum)).toEqual([
        "KL1221",
        "KL1223",
        "KL1225",
        "KL1219",
      ]);
      expect(result.dataset.rows[3]?.flight_index).toBe(4);
    });

    it("should be idempotent", () => {
      const batch = [hop(2, "KL1223", { seat: "14F" }), hop(9, "KL1237")];
      const once = mergeDatasets(existing(), batch).dataset;
      const twice = mergeDatasets(once, batch).dataset;

      expect(twice.rows).toEqual(once.rows);
    });

    it("should not modify the existing dataset", () => {
      const before = existing();
      mergeDatasets(before, [hop(1, "KL1221", { seat: "2C" })]);

      expect(before.rows[0]?.seat).toBe("1A");
    });

    it("should reject incoming rows that share a merge key", () => {
      let caught: unknown;
      try {
        mergeDatasets(existing(), [hop(4, "KL1227"), hop(4, "KL1227")]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MergeError);
      expect(caught).toMatchObject({ rowIndices: [0, 1] });
    });

    it("should reject a batch from another dialect", () => {
      const incoming = Dataset.empty(loadSchema("openflights"));
      expect(() => mergeDatasets(existing(), incoming)).toThrow(
        "Cannot merge openflights rows into a flights dataset"
      );
    });

    it("should reject a dialect without a merge key", () => {
      expect(() =>
        mergeDatasets(Dataset.empty(loadSchema("airports")), [])
      ).toThrow("Dialect airports declares no merge key");
    });
  });

  // ============================================================================
  // Replace window
  // ============================================================================

  describe("window", () => {
    const window = { after: makeDate(2023, 6, 2), before: makeDate(2023, 6, 30) };

    it("should drop existing rows in the window before upserting", () => {
      const result = mergeDatasets(existing(), [hop(3, "KL1225", { seat: "3D" })], window);

      expect(result).toMatchObject({ inserted: 1, replaced: 0, removed: 2 });
      expect(result.dataset.rows.map((r) => [r.flightnum, r.flight_index])).toEqual([
        ["KL1221", 1],
        ["KL1225", 2],
      ]);
      expect(result.dataset.rows[1]?.seat).toBe("3D");
    });

    it("should still replace rows outside the window by key", () => {
      const result = mergeDatasets(existing(), [hop(1, "KL1221", { seat: "2C" })], window);

      expect(result).toMatchObject({ inserted: 0, replaced: 1, removed: 2 });
      expect(result.dataset.rows.map((r) => r.seat)).toEqual(["2C"]);
    });

    it("should never remove rows whose window value is absent", () => {
      const dataset = new Dataset(schema, [
        hop(2, "KL1223", { date_as_dt: null }),
        hop(3, "KL1225"),
      ]);
      const result = mergeDatasets(dataset, [], { after: makeDate(2023, 1, 1) });

      expect(result.removed).toBe(1);
      expect(result.dataset.rows[0]?.flightnum).toBe("KL1223");
    });

    it("should treat bounds as inclusive", () => {
      const selected = filterByWindow(existing(), {
        after: makeDate(2023, 6, 1),
        before: makeDate(2023, 6, 2),
      });
      expect(selected.rows.map((r) => r.flightnum)).toEqual(["KL1221", "KL1223"]);
    });

    it("should reject a window whose after is later than before", () => {
      expect(() =>
        mergeDatasets(existing(), [], {
          after: makeDate(2023, 12, 31),
          before: makeDate(2023, 1, 1),
        })
      ).toThrow(MergeError);
    });
  });

  describe("compareValues", () => {
    it("should sort absent values first", () => {
      expect(compareValues(null, makeDate(2023, 1, 1))).toBeLessThan(0);
      expect(compareValues(null, null)).toBe(0);
    });

    it("should compare dates chronologically", () => {
      expect(compareValues(makeDate(2023, 2, 1), makeDate(2023, 1, 31))).toBeGreaterThan(0);
    });
  });
});
