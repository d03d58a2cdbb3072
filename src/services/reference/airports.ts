/**
 * Airport reference - fills airport columns of flight rows from the
 * OurAirports table
 *
 * Reference columns are linked to flight columns through shared provenance
 * tags (icao, name, lat, lon, ...), so neither side hard-codes the other's
 * column names.
 */

import { decodeRecords, parseCsv, writeFileAtomic } from "../../codec/csv.js";
import { decodeValue, encodeValue } from "../../codec/values.js";
import { SchemaError } from "../../errors.js";
import { referenceLogger } from "../../logger.js";
import { rateLimitedFetch } from "../../scraper/http.js";
import { findColumnByProvenance, findSideColumn } from "../../schema/columns.js";
import { filterByWindow } from "../merge/merge.js";

import type { Dataset } from "../../dataset/dataset.js";
import type {
  ColumnDefinition,
  DateWindow,
  Schema,
  Side,
  TypedRow,
} from "../../types/index.js";

export const OURAIRPORTS_URL =
  "https://davidmegginson.github.io/ourairports-data/airports.csv";

/** Provenance tags copied from the reference table into flight rows */
export const ENRICHED_FIELDS = [
  "icao",
  "name",
  "lat",
  "lon",
  "iso_country",
  "municipality",
  "ourairports_id",
] as const;

const SIDES: readonly Side[] = ["departure", "arrival"];

// ============================================================================
// Index
// ============================================================================

export class AirportIndex {
  private readonly byIata = new Map<string, TypedRow>();
  private readonly byIdent = new Map<string, TypedRow>();
  private readonly byKeyword = new Map<string, TypedRow>();

  private constructor(readonly schema: Schema) {}

  /** Index an airports dataset by IATA code, ident and keywords */
  static fromDataset(airports: Dataset): AirportIndex {
    const index = new AirportIndex(airports.schema);
    const iata = findColumnByProvenance(airports.schema, "iata");
    const ident = findColumnByProvenance(airports.schema, "icao");
    const keywords = findColumnByProvenance(airports.schema, "keywords");

    if (iata === undefined && ident === undefined) {
      throw new SchemaError(
        "Reference table declares neither an iata nor an icao column",
        airports.schema.dialect
      );
    }

    for (const row of airports.rows) {
      index.add(index.byIata, row, iata);
      index.add(index.byIdent, row, ident);

      const text = keywords !== undefined ? (row[keywords.name] ?? null) : null;
      if (typeof text === "string") {
        for (const keyword of text.split(",")) {
          index.put(index.byKeyword, keyword, row);
        }
      }
    }

    referenceLogger.debug(
      {
        airports: airports.size,
        iata: index.byIata.size,
        ident: index.byIdent.size,
      },
      "Airport index built"
    );
    return index;
  }

  private add(
    map: Map<string, TypedRow>,
    row: TypedRow,
    column: ColumnDefinition | undefined
  ): void {
    if (column === undefined) return;
    const value = row[column.name] ?? null;
    if (typeof value === "string") this.put(map, value, row);
  }

  private put(map: Map<string, TypedRow>, code: string, row: TypedRow): void {
    const key = code.trim().toUpperCase();
    // First listing wins
    if (key !== "" && !map.has(key)) map.set(key, row);
  }

  get size(): number {
    return this.byIata.size;
  }

  /** Match a code against IATA codes, then idents, then keywords */
  find(code: string): TypedRow | undefined {
    const key = code.trim().toUpperCase();
    if (key === "") return undefined;
    return this.byIata.get(key) ?? this.byIdent.get(key) ?? this.byKeyword.get(key);
  }
}

// ============================================================================
// Enrichment
// ============================================================================

export interface EnrichResult {
  dataset: Dataset;
  /** Rows that received at least one value */
  enriched: number;
  /** Airport codes without a reference entry, in first-seen order */
  unmatched: string[];
}

function fillSide(
  row: TypedRow,
  side: Side,
  flights: Schema,
  index: AirportIndex
): { row: TypedRow; changed: boolean; unmatched: string | null } {
  const codeColumn = findSideColumn(flights, side, "iata");
  const latColumn = findSideColumn(flights, side, "lat");
  if (codeColumn === undefined || latColumn === undefined) {
    return { row, changed: false, unmatched: null };
  }

  const code = row[codeColumn.name] ?? null;
  if ((row[latColumn.name] ?? null) !== null || typeof code !== "string" || code === "") {
    return { row, changed: false, unmatched: null };
  }

  const airport = index.find(code);
  if (airport === undefined) {
    return { row, changed: false, unmatched: code };
  }

  const next: TypedRow = { ...row };
  let changed = false;
  for (const field of ENRICHED_FIELDS) {
    const target = findSideColumn(flights, side, field);
    const source = findColumnByProvenance(index.schema, field);
    if (target === undefined || source === undefined) continue;
    if ((next[target.name] ?? null) !== null && next[target.name] !== "") continue;

    const value = airport[source.name] ?? null;
    if (value === null) continue;

    // Re-typed through text: the two tables may declare different types
    next[target.name] = decodeValue(encodeValue(value, source), target);
    changed = true;
  }

  return { row: next, changed, unmatched: null };
}

/**
 * Fill airport columns of rows whose latitude is absent, per side, matching
 * the side's IATA code. Present values are kept, and so are rows outside the
 * window when one is given.
 */
export function enrichAirports(
  dataset: Dataset,
  index: AirportIndex,
  window?: DateWindow
): EnrichResult {
  const eligible =
    window !== undefined ? new Set(filterByWindow(dataset, window).rows) : null;
  const unmatched = new Set<string>();
  let enriched = 0;

  const rows = dataset.rows.map((original) => {
    if (eligible !== null && !eligible.has(original)) return original;
    let row = original;
    let changed = false;
    for (const side of SIDES) {
      const result = fillSide(row, side, dataset.schema, index);
      row = result.row;
      changed = changed || result.changed;
      if (result.unmatched !== null) unmatched.add(result.unmatched);
    }
    if (changed) enriched++;
    return row;
  });

  referenceLogger.info(
    { rows: dataset.size, enriched, unmatched: unmatched.size },
    "Airport enrichment complete"
  );

  return { dataset: dataset.withRows(rows), enriched, unmatched: [...unmatched] };
}

// ============================================================================
// Download
// ============================================================================

export interface DownloadResult {
  airports: number;
  bytes: number;
}

/**
 * Refresh the reference file. The download is decoded against the airports
 * schema before it replaces the previous file.
 */
export async function downloadAirports(
  schema: Schema,
  dest: string,
  options: { url?: string; rateLimitMs?: number } = {}
): Promise<DownloadResult> {
  const url = options.url ?? OURAIRPORTS_URL;
  referenceLogger.info({ url, dest }, "Downloading airport reference data");

  const response = await rateLimitedFetch(url, options.rateLimitMs ?? 0);
  if (!response.ok) {
    referenceLogger.error(
      { status: response.status, statusText: response.statusText },
      "Failed to download airports"
    );
    throw new Error(
      `Failed to download airports: ${String(response.status)} ${response.statusText}`
    );
  }

  const content = await response.text();
  const { dataset, skipped } = decodeRecords(parseCsv(content, schema), schema, {
    onDecodeError: "skip",
  });
  if (dataset.size === 0) {
    throw new Error(`Downloaded airport table from ${url} has no rows`);
  }

  writeFileAtomic(dest, content);
  const bytes = Buffer.byteLength(content, "utf-8");

  referenceLogger.info(
    { airports: dataset.size, skipped: skipped.length, bytes },
    "Airport reference data updated"
  );
  return { airports: dataset.size, bytes };
}
