/**
 * Validator - cross-field consistency checks over a resolved dataset
 *
 * Two checks per row:
 * - distance: stored distance against the great-circle distance between the
 *   departure and arrival coordinates
 * - duration: stored duration against the elapsed time between the local
 *   departure and arrival timestamps, each shifted to UTC by its offset
 *
 * A row lacking the inputs of a check gets one "unvalidated" finding for it,
 * so "consistent" and "not checked" stay distinguishable. The dataset is
 * only read.
 */

import { isDuration, isLocalDateTime, toEpochMinutes } from "../../codec/temporal.js";
import { convertDistance, parseDistanceUnit } from "../../codec/units.js";
import { validationLogger } from "../../logger.js";
import { findColumnByProvenance, findSideColumn } from "../../schema/columns.js";
import { haversineDistance } from "./geo.js";

import type { Dataset } from "../../dataset/dataset.js";
import type {
  ColumnDefinition,
  DistanceUnit,
  Schema,
  Side,
  TypedRow,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type Check = "distance" | "duration";
export type Severity = "error" | "warning" | "unvalidated";

export interface Finding {
  rowIndex: number;
  /** Column holding the checked value */
  field: string;
  check: Check;
  severity: Severity;
  /** Recomputed value: kilometers or minutes */
  expected: number | null;
  /** Stored value in the same unit */
  actual: number | null;
  message: string;
}

export interface ValidationOptions {
  /** Allowed relative deviation of the stored distance */
  distanceTolerance?: number;
  durationToleranceMinutes?: number;
}

export const VALIDATION_DEFAULTS = {
  distanceTolerance: 0.1,
  durationToleranceMinutes: 15,
} as const;

export interface CheckSummary {
  consistent: number;
  inconsistent: number;
  unvalidated: number;
}

interface SideInputs {
  lat: ColumnDefinition | undefined;
  lon: ColumnDefinition | undefined;
  time: ColumnDefinition | undefined;
  gmtoffset: ColumnDefinition | undefined;
}

interface ValidationColumns {
  departure: SideInputs;
  arrival: SideInputs;
  distance: ColumnDefinition | undefined;
  distanceUnit: ColumnDefinition | undefined;
  duration: ColumnDefinition | undefined;
}

// ============================================================================
// Helpers
// ============================================================================

function sideInputs(schema: Schema, side: Side): SideInputs {
  return {
    lat: findSideColumn(schema, side, "lat"),
    lon: findSideColumn(schema, side, "lon"),
    time: findSideColumn(schema, side, "time"),
    gmtoffset: findSideColumn(schema, side, "gmtoffset"),
  };
}

function locateColumns(schema: Schema): ValidationColumns {
  return {
    departure: sideInputs(schema, "departure"),
    arrival: sideInputs(schema, "arrival"),
    distance: findColumnByProvenance(schema, "distance"),
    distanceUnit: findColumnByProvenance(schema, "distance_unit"),
    duration: findColumnByProvenance(schema, "duration"),
  };
}

function numberAt(row: TypedRow, column: ColumnDefinition | undefined): number | null {
  if (column === undefined) return null;
  const value = row[column.name] ?? null;
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Names of the inputs that are absent (or not declared) */
function missing(
  row: TypedRow,
  inputs: Record<string, ColumnDefinition | undefined>
): string[] {
  return Object.entries(inputs)
    .filter(([, column]) => column === undefined || (row[column.name] ?? null) === null)
    .map(([label, column]) => column?.name ?? label);
}

function rowUnit(
  row: TypedRow,
  columns: ValidationColumns
): DistanceUnit {
  const label = columns.distanceUnit !== undefined ? row[columns.distanceUnit.name] : null;
  const parsed = typeof label === "string" ? parseDistanceUnit(label) : null;
  return parsed ?? columns.distance?.unit ?? "km";
}

const round1 = (value: number): number => Math.round(value * 10) / 10;

// ============================================================================
// Checks
// ============================================================================

function checkDistance(
  row: TypedRow,
  rowIndex: number,
  columns: ValidationColumns,
  tolerance: number
): Finding | null {
  const field = columns.distance?.name ?? "distance";
  const base = { rowIndex, field, check: "distance" as const };

  const absent = missing(row, {
    lat_departure: columns.departure.lat,
    lon_departure: columns.departure.lon,
    lat_arrival: columns.arrival.lat,
    lon_arrival: columns.arrival.lon,
  });
  const depLat = numberAt(row, columns.departure.lat);
  const depLon = numberAt(row, columns.departure.lon);
  const arrLat = numberAt(row, columns.arrival.lat);
  const arrLon = numberAt(row, columns.arrival.lon);
  if (depLat === null || depLon === null || arrLat === null || arrLon === null) {
    return {
      ...base,
      severity: "unvalidated",
      expected: null,
      actual: null,
      message: `Cannot check distance: missing ${absent.join(", ")}`,
    };
  }

  const computed = haversineDistance(
    { lat: depLat, lon: depLon },
    { lat: arrLat, lon: arrLon }
  );
  const expected = round1(computed);

  const stored = numberAt(row, columns.distance);
  if (stored === null) {
    return {
      ...base,
      severity: "warning",
      expected,
      actual: null,
      message: `Distance missing; great-circle distance is ${String(expected)} km`,
    };
  }

  const storedKm = convertDistance(stored, rowUnit(row, columns), "km");
  const deviation =
    computed === 0
      ? storedKm === 0
        ? 0
        : Number.POSITIVE_INFINITY
      : Math.abs(storedKm - computed) / computed;

  if (deviation > tolerance) {
    return {
      ...base,
      severity: "error",
      expected,
      actual: round1(storedKm),
      message: `Distance ${String(round1(storedKm))} km deviates ${String(Math.round(deviation * 100))}% from ${String(expected)} km`,
    };
  }

  return null;
}

function checkDuration(
  row: TypedRow,
  rowIndex: number,
  columns: ValidationColumns,
  toleranceMinutes: number
): Finding | null {
  const field = columns.duration?.name ?? "duration";
  const base = { rowIndex, field, check: "duration" as const };

  const absent = missing(row, {
    time_departure: columns.departure.time,
    gmtoffset_departure: columns.departure.gmtoffset,
    time_arrival: columns.arrival.time,
    gmtoffset_arrival: columns.arrival.gmtoffset,
  });
  const depTime = columns.departure.time !== undefined ? (row[columns.departure.time.name] ?? null) : null;
  const arrTime = columns.arrival.time !== undefined ? (row[columns.arrival.time.name] ?? null) : null;
  const depOffset = numberAt(row, columns.departure.gmtoffset);
  const arrOffset = numberAt(row, columns.arrival.gmtoffset);

  if (
    !isLocalDateTime(depTime) ||
    !isLocalDateTime(arrTime) ||
    depOffset === null ||
    arrOffset === null
  ) {
    return {
      ...base,
      severity: "unvalidated",
      expected: null,
      actual: null,
      message: `Cannot check duration: missing ${absent.join(", ")}`,
    };
  }

  const departureUtc = toEpochMinutes(depTime) - depOffset * 60;
  const arrivalUtc = toEpochMinutes(arrTime) - arrOffset * 60;
  const computed = Math.round(arrivalUtc - departureUtc);

  const storedValue = columns.duration !== undefined ? (row[columns.duration.name] ?? null) : null;
  const stored = isDuration(storedValue) ? storedValue.minutes : null;

  if (computed < 0) {
    return {
      ...base,
      severity: "error",
      expected: computed,
      actual: stored,
      message: `Arrival is ${String(-computed)} minutes before departure`,
    };
  }

  if (stored === null) {
    return {
      ...base,
      severity: "warning",
      expected: computed,
      actual: null,
      message: `Duration missing; elapsed time is ${String(computed)} minutes`,
    };
  }

  if (Math.abs(computed - stored) > toleranceMinutes) {
    return {
      ...base,
      severity: "error",
      expected: computed,
      actual: stored,
      message: `Duration ${String(stored)} min differs from elapsed ${String(computed)} min`,
    };
  }

  return null;
}

// ============================================================================
// Public API
// ============================================================================

export function validateDataset(
  dataset: Dataset,
  options: ValidationOptions = {}
): Finding[] {
  const distanceTolerance =
    options.distanceTolerance ?? VALIDATION_DEFAULTS.distanceTolerance;
  const durationTolerance =
    options.durationToleranceMinutes ??
    VALIDATION_DEFAULTS.durationToleranceMinutes;
  const columns = locateColumns(dataset.schema);
  const findings: Finding[] = [];

  dataset.rows.forEach((row, rowIndex) => {
    const distance = checkDistance(row, rowIndex, columns, distanceTolerance);
    if (distance !== null) findings.push(distance);

    const duration = checkDuration(row, rowIndex, columns, durationTolerance);
    if (duration !== null) findings.push(duration);
  });

  const summary = summarizeFindings(findings, dataset.size);
  validationLogger.info(
    { rows: dataset.size, findings: findings.length, summary },
    "Validation complete"
  );

  return findings;
}

/**
 * Per-check row counts. A row with an error or warning for a check counts
 * as inconsistent for it.
 */
export function summarizeFindings(
  findings: readonly Finding[],
  rowCount: number
): Record<Check, CheckSummary> {
  const summarize = (check: Check): CheckSummary => {
    const ofCheck = findings.filter((f) => f.check === check);
    const unvalidated = new Set(
      ofCheck.filter((f) => f.severity === "unvalidated").map((f) => f.rowIndex)
    ).size;
    const inconsistent = new Set(
      ofCheck.filter((f) => f.severity !== "unvalidated").map((f) => f.rowIndex)
    ).size;
    return {
      consistent: rowCount - unvalidated - inconsistent,
      inconsistent,
      unvalidated,
    };
  };

  return { distance: summarize("distance"), duration: summarize("duration") };
}
