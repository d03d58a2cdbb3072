import { describe, it, expect } from "vitest";

import { SchemaError } from "../../../src/errors.js";
import {
  findSideColumn,
  mergeKeyColumns,
} from "../../../src/schema/columns.js";
import {
  clearSchemaCache,
  loadSchema,
  parseSchema,
} from "../../../src/schema/registry.js";

function document(columns: unknown[], header: Record<string, unknown> = {}) {
  return {
    document: {
      version: 1,
      source: "test",
      encoding: "utf-8",
      delimiter: ",",
      recordDelimiter: "\n",
      header: true,
      sideSuffixes: { departure: "_dep", arrival: "_arr" },
      ...header,
    },
    columns,
  };
}

describe("schema/registry", () => {
  describe("loadSchema", () => {
    it("should load the flights schema with its merge key in declared order", () => {
      const schema = loadSchema("flights");

      expect(schema.columns[0]?.name).toBe("flight_index");
      expect(mergeKeyColumns(schema).map((c) => c.name)).toEqual([
        "date",
        "date_as_dt",
        "dt_info",
        "iata_dep",
        "time_dep",
        "iata_arr",
        "time_arr",
        "flightnum",
        "detail_url",
      ]);
      expect(schema.windowColumn).toBe("date_as_dt");
      expect(schema.sequenceColumn).toBe("flight_index");
    });

    it("should locate side columns by provenance", () => {
      const schema = loadSchema("flights");
      expect(findSideColumn(schema, "arrival", "lat")?.name).toBe("lat_arr");
      expect(findSideColumn(schema, "departure", "tzid")?.name).toBe("tzid_dep");
    });

    it("should return the same frozen schema on repeated loads", () => {
      const first = loadSchema("openflights");
      expect(loadSchema("openflights")).toBe(first);
      expect(Object.isFrozen(first.columns)).toBe(true);
    });

    it("should re-read documents after the cache is cleared", () => {
      const first = loadSchema("myflightpath");
      clearSchemaCache();
      const second = loadSchema("myflightpath");

      expect(second).not.toBe(first);
      expect(second).toEqual(first);
    });

    it("should fail with a SchemaError for a missing document directory", () => {
      expect(() =>
        loadSchema("flights", { schemaDir: "/nonexistent/schemas" })
      ).toThrow(SchemaError);
    });
  });

  describe("parseSchema", () => {
    it("should reject an unknown column type", () => {
      expect(() =>
        parseSchema("flights", document([{ name: "when", type: "instant" }]))
      ).toThrow("Column 'when' declares unknown type 'instant'");
    });

    it("should reject duplicate column names", () => {
      expect(() =>
        parseSchema(
          "flights",
          document([
            { name: "seat", type: "string" },
            { name: "seat", type: "string" },
          ])
        )
      ).toThrow("Duplicate column name 'seat'");
    });

    it("should reject a departure column without an arrival counterpart", () => {
      expect(() =>
        parseSchema(
          "flights",
          document([
            { name: "iata_dep", type: "string", side: "departure", provenance: "iata" },
            { name: "gate_arr", type: "string", side: "arrival" },
          ])
        )
      ).toThrow("Column 'iata_dep' (departure) has no arrival counterpart");
    });

    it("should pair side columns by name when they carry no provenance", () => {
      const schema = parseSchema(
        "flights",
        document([
          { name: "gate_dep", type: "string", side: "departure" },
          { name: "gate_arr", type: "string", side: "arrival" },
        ])
      );
      expect(schema.columns.map((c) => c.position)).toEqual([0, 1]);
    });

    it("should require the window column to be a date", () => {
      expect(() =>
        parseSchema(
          "flights",
          document([{ name: "when", type: "datetime" }], { windowColumn: "when" })
        )
      ).toThrow("Window column 'when' must be of type date, not datetime");
    });

    it("should reject a document that fails structural validation", () => {
      expect(() =>
        parseSchema("flights", { document: { version: 0 }, columns: [] })
      ).toThrow(SchemaError);
    });
  });
});
