import { describe, it, expect } from "vitest";

import { decodeRow, emptyRow, encodeRow } from "../../../src/codec/rows.js";
import { makeDate } from "../../../src/codec/temporal.js";
import { DecodeError, EncodeError } from "../../../src/errors.js";
import { flightsSchema, lhrJfk } from "../../fixtures/flights.js";

describe("codec/rows", () => {
  const schema = flightsSchema();

  it("should round-trip a full flight row", () => {
    const row = lhrJfk();
    expect(decodeRow(encodeRow(row, schema), schema)).toEqual(row);
  });

  it("should encode fields in declared column order", () => {
    const fields = encodeRow(lhrJfk({ flight_index: 7 }), schema);
    expect(fields).toHaveLength(schema.columns.length);
    expect(fields[0]).toBe("7");
    expect(fields[1]).toBe("2023-03-14");
    expect(fields[schema.columns.findIndex((c) => c.name === "iata_arr")]).toBe(
      "JFK"
    );
  });

  it("should treat missing trailing fields as empty", () => {
    const row = decodeRow(["1", "2023", "2023-01-01"], schema);
    expect(row.flight_index).toBe(1);
    expect(row.date_as_dt).toEqual(makeDate(2023, 1, 1));
    expect(row.iata_dep).toBe("");
    expect(row.lat_dep).toBeNull();
  });

  it("should leave an unparseable lookup date absent", () => {
    const fields = encodeRow(lhrJfk(), schema);
    const position = schema.columns.findIndex((c) => c.name === "date_str_dep");
    fields[position] = "2023-03";

    const row = decodeRow(fields, schema);
    expect(row.date_str_dep).toBeNull();
  });

  it("should attach the row index to decode errors", () => {
    const fields = encodeRow(lhrJfk(), schema);
    fields[schema.columns.findIndex((c) => c.name === "dist")] = "far";

    let caught: unknown;
    try {
      decodeRow(fields, schema, 4);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({ rowIndex: 4, column: "dist" });
  });

  it("should reject columns the schema does not declare", () => {
    expect(() => encodeRow({ ...emptyRow(schema), gate: "B42" }, schema)).toThrow(
      EncodeError
    );
  });
});
