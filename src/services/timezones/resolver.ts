/**
 * Timezone Resolver
 *
 * Fills the tzid/gmtoffset columns of each side (departure, arrival) from
 * the side's coordinates and local date. Distinct coordinate pairs, rounded
 * to four decimals, cost one external lookup per resolver instance; offsets
 * for other dates at the same place are derived from the IANA zone.
 *
 * A LookupStopError (quota, auth) ends all further calls and the partial
 * result is returned. A ResolutionError only affects the rows of that
 * coordinate pair; anything else propagates.
 */

import { dateOf, formatDate, isCalendarDate, isLocalDateTime } from "../../codec/temporal.js";
import {
  LookupStopError,
  ResolutionError,
  SchemaError,
  errorMessage,
} from "../../errors.js";
import { tzLogger } from "../../logger.js";
import { findSideColumn } from "../../schema/columns.js";
import { offsetForDate } from "./offsets.js";

import type { Dataset } from "../../dataset/dataset.js";
import type {
  CalendarDate,
  ColumnDefinition,
  Schema,
  Side,
  TimezoneLookup,
  TypedRow,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface TimezoneResolverOptions {
  /** Update at most this many rows in one run */
  maxRows?: number;
  /** Re-resolve sides that already carry a tzid and offset */
  overwrite?: boolean;
  /** Decimal places coordinates are rounded to before lookup */
  precision?: number;
}

export interface CacheEntry {
  tzid: string;
  gmtOffset: number;
  queriedDate: CalendarDate;
}

export interface LookupFailure {
  lat: number;
  lon: number;
  rows: number[];
  error: string;
}

export interface ResolveResult {
  dataset: Dataset;
  /** Rows that received at least one tzid/offset */
  resolvedRows: number;
  /** Rows still missing a tzid or offset on some side */
  unresolvedRows: number;
  /** External lookups issued */
  lookups: number;
  cacheHits: number;
  /** Why calls stopped early, if they did */
  stopped: LookupStopError["reason"] | null;
  failures: LookupFailure[];
}

interface SideColumns {
  side: Side;
  lat: ColumnDefinition;
  lon: ColumnDefinition;
  tzid: ColumnDefinition;
  gmtoffset: ColumnDefinition;
  lookupDate: ColumnDefinition | undefined;
  time: ColumnDefinition | undefined;
}

interface Task {
  rowIndex: number;
  sides: SideColumns;
  date: CalendarDate;
}

interface Group {
  key: string;
  lat: number;
  lon: number;
  tasks: Task[];
}

const SIDES: readonly Side[] = ["departure", "arrival"];

// ============================================================================
// Column discovery
// ============================================================================

function resolveSideColumns(schema: Schema): SideColumns[] {
  const result: SideColumns[] = [];

  for (const side of SIDES) {
    const lat = findSideColumn(schema, side, "lat");
    const lon = findSideColumn(schema, side, "lon");
    const tzid = findSideColumn(schema, side, "tzid");
    const gmtoffset = findSideColumn(schema, side, "gmtoffset");
    if (
      lat === undefined ||
      lon === undefined ||
      tzid === undefined ||
      gmtoffset === undefined
    ) {
      continue;
    }

    const lookupDate = schema.columns.find(
      (c) => c.side === side && c.timezoneLookup && c.type === "date"
    );
    result.push({
      side,
      lat,
      lon,
      tzid,
      gmtoffset,
      lookupDate,
      time: findSideColumn(schema, side, "time"),
    });
  }

  if (result.length === 0) {
    throw new SchemaError(
      "No side declares lat, lon, tzid and gmtoffset columns",
      schema.dialect
    );
  }
  return result;
}

// ============================================================================
// Resolver
// ============================================================================

export class TimezoneResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly maxRows: number;
  private readonly overwrite: boolean;
  private readonly precision: number;

  constructor(
    private readonly lookup: TimezoneLookup,
    options: TimezoneResolverOptions = {}
  ) {
    this.maxRows = options.maxRows ?? Number.POSITIVE_INFINITY;
    this.overwrite = options.overwrite ?? false;
    this.precision = options.precision ?? 4;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /** Lookup date for a side: its lookup column, its local time, the row date */
  private lookupDate(
    row: TypedRow,
    sides: SideColumns,
    schema: Schema
  ): CalendarDate | null {
    const stored =
      sides.lookupDate !== undefined ? (row[sides.lookupDate.name] ?? null) : null;
    if (isCalendarDate(stored)) return stored;

    const time = sides.time !== undefined ? (row[sides.time.name] ?? null) : null;
    if (isLocalDateTime(time)) return dateOf(time);

    const fallback =
      schema.windowColumn !== null ? (row[schema.windowColumn] ?? null) : null;
    return isCalendarDate(fallback) ? fallback : null;
  }

  private needsResolution(row: TypedRow, sides: SideColumns): boolean {
    return (
      this.overwrite ||
      (row[sides.tzid.name] ?? null) === null ||
      (row[sides.gmtoffset.name] ?? null) === null
    );
  }

  private round(value: number): number {
    return Number(value.toFixed(this.precision));
  }

  private plan(dataset: Dataset, allSides: SideColumns[]): Group[] {
    const groups = new Map<string, Group>();
    let selectedRows = 0;

    dataset.rows.forEach((row, rowIndex) => {
      if (selectedRows >= this.maxRows) return;

      let selected = false;
      for (const sides of allSides) {
        if (!this.needsResolution(row, sides)) continue;

        const lat = row[sides.lat.name] ?? null;
        const lon = row[sides.lon.name] ?? null;
        const date = this.lookupDate(row, sides, dataset.schema);
        if (typeof lat !== "number" || typeof lon !== "number" || date === null) {
          tzLogger.debug(
            { rowIndex, side: sides.side },
            "Missing coordinates or date; side left unresolved"
          );
          continue;
        }

        const rlat = this.round(lat);
        const rlon = this.round(lon);
        const key = `${String(rlat)},${String(rlon)}`;
        const group = groups.get(key) ?? { key, lat: rlat, lon: rlon, tasks: [] };
        group.tasks.push({ rowIndex, sides, date });
        groups.set(key, group);
        selected = true;
      }

      if (selected) selectedRows++;
    });

    return [...groups.values()];
  }

  async resolve(dataset: Dataset): Promise<ResolveResult> {
    const allSides = resolveSideColumns(dataset.schema);
    const groups = this.plan(dataset, allSides);
    const rows = [...dataset.rows];
    const touched = new Set<number>();
    const failures: LookupFailure[] = [];

    let lookups = 0;
    let cacheHits = 0;
    let stopped: ResolveResult["stopped"] = null;

    tzLogger.info(
      { rows: dataset.size, pairs: groups.length, cached: this.cache.size },
      "Resolving timezones"
    );

    for (const group of groups) {
      let entry = this.cache.get(group.key);

      if (entry !== undefined) {
        cacheHits++;
      } else if (stopped !== null) {
        continue;
      } else {
        const first = group.tasks[0];
        if (first === undefined) continue;

        try {
          lookups++;
          const info = await this.lookup.lookup(group.lat, group.lon, first.date);
          entry = { ...info, queriedDate: first.date };
          this.cache.set(group.key, entry);
        } catch (error) {
          if (error instanceof LookupStopError) {
            stopped = error.reason;
            tzLogger.warn(
              { reason: error.reason, error: error.message },
              "Timezone lookups stopped"
            );
            continue;
          }
          if (!(error instanceof ResolutionError)) throw error;

          const rowsOfPair = [...new Set(group.tasks.map((t) => t.rowIndex))];
          failures.push({
            lat: group.lat,
            lon: group.lon,
            rows: rowsOfPair,
            error: errorMessage(error),
          });
          tzLogger.error(
            { lat: group.lat, lon: group.lon, rows: rowsOfPair, error: errorMessage(error) },
            "Timezone lookup failed"
          );
          continue;
        }
      }

      for (const task of group.tasks) {
        const current = rows[task.rowIndex];
        if (current === undefined) continue;
        rows[task.rowIndex] = this.apply(current, task, entry);
        touched.add(task.rowIndex);
      }
    }

    const result = dataset.withRows(rows);
    const unresolvedRows = result.rows.filter((row) =>
      allSides.some(
        (sides) =>
          (row[sides.tzid.name] ?? null) === null ||
          (row[sides.gmtoffset.name] ?? null) === null
      )
    ).length;

    tzLogger.info(
      {
        resolvedRows: touched.size,
        unresolvedRows,
        lookups,
        cacheHits,
        stopped,
        failures: failures.length,
      },
      "Timezone resolution finished"
    );

    return {
      dataset: result,
      resolvedRows: touched.size,
      unresolvedRows,
      lookups,
      cacheHits,
      stopped,
      failures,
    };
  }

  private apply(row: TypedRow, task: Task, entry: CacheEntry): TypedRow {
    const sameDay = formatDate(entry.queriedDate) === formatDate(task.date);
    const gmtOffset = sameDay
      ? entry.gmtOffset
      : (offsetForDate(entry.tzid, task.date) ?? entry.gmtOffset);

    const next: TypedRow = {
      ...row,
      [task.sides.tzid.name]: entry.tzid,
      [task.sides.gmtoffset.name]: gmtOffset,
    };
    if (task.sides.lookupDate !== undefined) {
      next[task.sides.lookupDate.name] = task.date;
    }
    return next;
  }
}
