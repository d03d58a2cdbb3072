/**
 * Flight fixtures for testing
 */

import { emptyRow } from "../../src/codec/rows.js";
import { makeDate, makeDateTime, makeDuration } from "../../src/codec/temporal.js";
import { loadSchema } from "../../src/schema/registry.js";

import type { Schema, TypedRow } from "../../src/types/index.js";

export function flightsSchema(): Schema {
  return loadSchema("flights");
}

/** Full flight row; every column absent unless overridden */
export function flightRow(overrides: TypedRow = {}): TypedRow {
  return { ...emptyRow(flightsSchema()), ...overrides };
}

/** London Heathrow → New York JFK, 2023-03-14 */
export function lhrJfk(overrides: TypedRow = {}): TypedRow {
  return flightRow({
    date: "2023-03-14",
    date_as_dt: makeDate(2023, 3, 14),
    dt_info: "YMDT",
    iata_dep: "LHR",
    icao_dep: "EGLL",
    time_dep: makeDateTime(2023, 3, 14, 11, 0),
    lat_dep: 51.47,
    lon_dep: -0.45,
    tzid_dep: "Europe/London",
    gmtoffset_dep: 0,
    iata_arr: "JFK",
    icao_arr: "KJFK",
    time_arr: makeDateTime(2023, 3, 14, 14, 0),
    lat_arr: 40.64,
    lon_arr: -73.78,
    tzid_arr: "America/New_York",
    gmtoffset_arr: -4,
    dist: 5540,
    dist_units: "km",
    duration: makeDuration(7 * 60),
    airline: "British Airways",
    flightnum: "BA117",
    ...overrides,
  });
}

/** Short domestic hop keyed by date, route and flight number */
export function hop(
  day: number,
  flightnum: string,
  overrides: TypedRow = {}
): TypedRow {
  return flightRow({
    date: `2023-06-${String(day).padStart(2, "0")}`,
    date_as_dt: makeDate(2023, 6, day),
    dt_info: "YMDT",
    iata_dep: "AMS",
    iata_arr: "CDG",
    time_dep: makeDateTime(2023, 6, day, 9, 0),
    time_arr: makeDateTime(2023, 6, day, 10, 15),
    flightnum,
    ...overrides,
  });
}
