/**
 * Aircraft reference - fills ICAO and IATA type designators from the model
 * name recorded on each flight
 */

import { SchemaError } from "../../errors.js";
import { referenceLogger } from "../../logger.js";
import { findColumnByProvenance } from "../../schema/columns.js";
import { filterByWindow } from "../merge/merge.js";

import type { Dataset } from "../../dataset/dataset.js";
import type { DateWindow, TypedRow } from "../../types/index.js";
import type { EnrichResult } from "./airports.js";

/** Designator provenance tags copied into flight rows */
export const AIRCRAFT_FIELDS = ["icao_type", "iata_type"] as const;

type AircraftField = (typeof AIRCRAFT_FIELDS)[number];

export type AircraftTypes = Record<AircraftField, string | null>;

function modelKey(model: string): string {
  return model.trim().toLowerCase();
}

function text(row: TypedRow, column: string | undefined): string | null {
  if (column === undefined) return null;
  const value = row[column] ?? null;
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

// ============================================================================
// Index
// ============================================================================

export class AircraftIndex {
  private readonly byModel = new Map<string, AircraftTypes>();

  /** Index a designator table by model name */
  static fromDataset(aircraft: Dataset): AircraftIndex {
    const model = findColumnByProvenance(aircraft.schema, "model_name");
    if (model === undefined) {
      throw new SchemaError(
        "Reference table declares no model_name column",
        aircraft.schema.dialect
      );
    }
    const icao = findColumnByProvenance(aircraft.schema, "icao_type")?.name;
    const iata = findColumnByProvenance(aircraft.schema, "iata_type")?.name;

    const index = new AircraftIndex();
    for (const row of aircraft.rows) {
      const name = text(row, model.name);
      if (name === null) continue;

      const key = modelKey(name);
      // First listing wins
      if (index.byModel.has(key)) continue;
      index.byModel.set(key, { icao_type: text(row, icao), iata_type: text(row, iata) });
    }

    referenceLogger.debug(
      { aircraft: aircraft.size, models: index.byModel.size },
      "Aircraft index built"
    );
    return index;
  }

  get size(): number {
    return this.byModel.size;
  }

  /** Exact model name match, ignoring case and surrounding whitespace */
  find(model: string): AircraftTypes | undefined {
    return this.byModel.get(modelKey(model));
  }
}

// ============================================================================
// Enrichment
// ============================================================================

/**
 * Fill missing type designators of rows that name a model. Rows outside the
 * window, when one is given, are left alone.
 */
export function enrichAircraft(
  dataset: Dataset,
  index: AircraftIndex,
  window?: DateWindow
): EnrichResult {
  const schema = dataset.schema;
  const model = findColumnByProvenance(schema, "model_name");
  if (model === undefined) {
    throw new SchemaError("Dataset declares no model_name column", schema.dialect);
  }
  const targets = AIRCRAFT_FIELDS.flatMap((field) => {
    const column = findColumnByProvenance(schema, field);
    return column !== undefined ? [{ field, name: column.name }] : [];
  });

  const eligible =
    window !== undefined ? new Set(filterByWindow(dataset, window).rows) : null;
  const unmatched = new Set<string>();
  let enriched = 0;

  const rows = dataset.rows.map((row) => {
    if (eligible !== null && !eligible.has(row)) return row;

    const name = text(row, model.name);
    if (name === null) return row;
    const missing = targets.filter((target) => text(row, target.name) === null);
    if (missing.length === 0) return row;

    const types = index.find(name);
    if (types === undefined) {
      unmatched.add(name);
      return row;
    }

    const next: TypedRow = { ...row };
    let changed = false;
    for (const target of missing) {
      const value = types[target.field];
      if (value === null) continue;
      next[target.name] = value;
      changed = true;
    }
    if (!changed) return row;

    enriched++;
    return next;
  });

  referenceLogger.info(
    { rows: dataset.size, enriched, unmatched: unmatched.size },
    "Aircraft enrichment complete"
  );

  return { dataset: dataset.withRows(rows), enriched, unmatched: [...unmatched] };
}
