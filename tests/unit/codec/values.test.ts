import { describe, it, expect } from "vitest";

import {
  makeDate,
  makeDateTime,
  makeDuration,
} from "../../../src/codec/temporal.js";
import { decodeValue, encodeValue } from "../../../src/codec/values.js";
import { DecodeError, EncodeError } from "../../../src/errors.js";

import type {
  ColumnDefinition,
  ColumnType,
  TypedValue,
} from "../../../src/types/index.js";

function columnOf(
  type: ColumnType,
  overrides: Partial<ColumnDefinition> = {}
): ColumnDefinition {
  return {
    name: `${type}_col`,
    type,
    position: 0,
    mergeKey: false,
    side: null,
    provenance: [],
    timezoneLookup: false,
    required: false,
    format: null,
    unit: null,
    valueMap: null,
    default: null,
    notes: null,
    ...overrides,
  };
}

describe("codec/values", () => {
  // ============================================================================
  // Round trip
  // ============================================================================

  describe("round trip", () => {
    const cases: [ColumnType, TypedValue | null][] = [
      ["string", "Heathrow, Terminal 5"],
      ["string", null],
      ["date", makeDate(2023, 2, 28)],
      ["date", null],
      ["datetime", makeDateTime(2024, 2, 29, 23, 59)],
      ["datetime", null],
      ["timedelta", makeDuration(0)],
      ["timedelta", makeDuration(27 * 60 + 5)],
      ["timedelta", null],
      ["integer", -12],
      ["integer", null],
      ["float", 51.4706],
      ["float", null],
      ["boolean", true],
      ["boolean", false],
      ["boolean", null],
    ];

    it.each(cases)("should decode(encode(v)) == v for %s %j", (type, value) => {
      const column = columnOf(type);
      expect(decodeValue(encodeValue(value, column), column)).toEqual(value);
    });
  });

  // ============================================================================
  // Decoding
  // ============================================================================

  describe("decodeValue", () => {
    it("should decode empty fields as absent", () => {
      expect(decodeValue("", columnOf("string"))).toBeNull();
      expect(decodeValue("  ", columnOf("integer"))).toBeNull();
    });

    it("should decode empty merge-key strings as empty strings", () => {
      expect(decodeValue("", columnOf("string", { mergeKey: true }))).toBe("");
    });

    it("should accept a T separator and drop seconds in datetimes", () => {
      expect(decodeValue("2023-05-01T08:30:45", columnOf("datetime"))).toEqual(
        makeDateTime(2023, 5, 1, 8, 30)
      );
    });

    it("should reject impossible calendar dates", () => {
      expect(() => decodeValue("2023-02-29", columnOf("date"))).toThrow(
        DecodeError
      );
    });

    it("should reject negative durations", () => {
      expect(() => decodeValue("-1:30", columnOf("timedelta"))).toThrow(
        "durations cannot be negative"
      );
    });

    it("should decode durations longer than a day", () => {
      expect(decodeValue("26:10", columnOf("timedelta"))).toEqual(
        makeDuration(1570)
      );
    });

    it("should accept integral decimals for integers", () => {
      expect(decodeValue("42.0", columnOf("integer"))).toBe(42);
    });

    it("should name the column and raw text on non-numeric input", () => {
      expect(() => decodeValue("abc", columnOf("float"))).toThrow(
        "Cannot decode column 'float_col' from 'abc': not a number"
      );
    });

    it("should reject numbers that do not fit a double or a safe integer", () => {
      expect(() => decodeValue("1e400", columnOf("float"))).toThrow(
        "Cannot decode column 'float_col' from '1e400': number out of range"
      );
      expect(() => decodeValue("9007199254740993", columnOf("integer"))).toThrow(
        "integer out of range"
      );
      expect(decodeValue("9007199254740991", columnOf("integer"))).toBe(
        Number.MAX_SAFE_INTEGER
      );
    });

    it("should decode boolean tokens case-insensitively", () => {
      const column = columnOf("boolean");
      expect(decodeValue("YES", column)).toBe(true);
      expect(decodeValue("0", column)).toBe(false);
      expect(() => decodeValue("maybe", column)).toThrow(DecodeError);
    });
  });

  // ============================================================================
  // Encoding
  // ============================================================================

  describe("encodeValue", () => {
    it("should use canonical text forms", () => {
      expect(encodeValue(makeDate(2023, 1, 5), columnOf("date"))).toBe(
        "2023-01-05"
      );
      expect(
        encodeValue(makeDateTime(2023, 1, 5, 7, 3), columnOf("datetime"))
      ).toBe("2023-01-05 07:03");
      expect(encodeValue(makeDuration(65), columnOf("timedelta"))).toBe(
        "01:05"
      );
      expect(encodeValue(true, columnOf("boolean"))).toBe("True");
    });

    it("should reject a value of the wrong type", () => {
      expect(() => encodeValue("soon", columnOf("date"))).toThrow(EncodeError);
      expect(() => encodeValue(1.5, columnOf("integer"))).toThrow(EncodeError);
    });
  });
});
