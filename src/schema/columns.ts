/**
 * Column lookups over a loaded schema. Components locate the columns they
 * work on through these helpers (merge keys, side + provenance), never by
 * hard-coded names.
 */

import type { ColumnDefinition, Schema, Side } from "../types/index.js";

/** Merge-key columns in declared order */
export function mergeKeyColumns(schema: Schema): ColumnDefinition[] {
  return schema.columns.filter((c) => c.mergeKey);
}

/**
 * Column on the given side populated from the given upstream field,
 * e.g. (departure, "lat") → lat_dep.
 */
export function findSideColumn(
  schema: Schema,
  side: Side,
  provenance: string
): ColumnDefinition | undefined {
  return schema.columns.find(
    (c) => c.side === side && c.provenance.includes(provenance)
  );
}

/** First side-less column populated from the given upstream field */
export function findColumnByProvenance(
  schema: Schema,
  provenance: string
): ColumnDefinition | undefined {
  return schema.columns.find(
    (c) => c.side === null && c.provenance.includes(provenance)
  );
}
