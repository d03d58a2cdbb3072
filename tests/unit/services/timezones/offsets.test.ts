import { describe, it, expect } from "vitest";

import { makeDate } from "../../../../src/codec/temporal.js";
import { offsetForDate } from "../../../../src/services/timezones/offsets.js";

describe("services/timezones/offsets", () => {
  it("should follow daylight saving transitions", () => {
    expect(offsetForDate("America/New_York", makeDate(2023, 1, 10))).toBe(-5);
    expect(offsetForDate("America/New_York", makeDate(2023, 7, 10))).toBe(-4);
  });

  it("should handle half-hour offsets", () => {
    expect(offsetForDate("Asia/Kolkata", makeDate(2023, 3, 1))).toBe(5.5);
  });

  it("should return 0 for UTC", () => {
    expect(offsetForDate("UTC", makeDate(2023, 3, 1))).toBe(0);
  });

  it("should return null for an unknown zone", () => {
    expect(offsetForDate("Mars/Olympus_Mons", makeDate(2023, 3, 1))).toBeNull();
  });
});
