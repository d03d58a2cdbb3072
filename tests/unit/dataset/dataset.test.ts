import { describe, it, expect } from "vitest";

import { Dataset } from "../../../src/dataset/dataset.js";
import { MergeError } from "../../../src/errors.js";
import { loadSchema } from "../../../src/schema/registry.js";
import { flightsSchema, hop } from "../../fixtures/flights.js";

describe("dataset", () => {
  const schema = flightsSchema();

  it("should key rows by their encoded merge-key values", () => {
    const dataset = new Dataset(schema, [hop(2, "KL1223")]);

    expect(dataset.keyOf(hop(2, "KL1223"))).toBe(
      JSON.stringify([
        "2023-06-02",
        "2023-06-02",
        "YMDT",
        "AMS",
        "2023-06-02 09:00",
        "CDG",
        "2023-06-02 10:15",
        "KL1223",
        "",
      ])
    );
  });

  it("should use null for absent key components", () => {
    const dataset = Dataset.empty(schema);
    const key = dataset.keyOf(hop(2, "KL1223", { time_dep: null }));
    expect(JSON.parse(key)).toContain(null);
  });

  it("should index rows by key", () => {
    const dataset = new Dataset(schema, [hop(1, "KL1221"), hop(2, "KL1223")]);

    expect(dataset.positionOf(dataset.keyOf(hop(2, "KL1223")))).toBe(1);
    expect(dataset.has(dataset.keyOf(hop(3, "KL1225")))).toBe(false);
  });

  it("should reject two rows sharing a merge key", () => {
    let caught: unknown;
    try {
      new Dataset(schema, [hop(1, "KL1221"), hop(2, "KL1223"), hop(1, "KL1221")]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MergeError);
    expect(caught).toMatchObject({ rowIndices: [0, 2] });
  });

  it("should not index dialects without a merge key", () => {
    const airports = loadSchema("airports");
    const row = { iata_code: "LHR" };
    expect(new Dataset(airports, [row, row]).size).toBe(2);
  });

  it("should freeze its rows", () => {
    const dataset = new Dataset(schema, [hop(1, "KL1221")]);
    expect(Object.isFrozen(dataset.rows)).toBe(true);
  });
});
