/**
 * Row codec - ordered text fields ⇄ TypedRow, driven by a schema
 */

import { DecodeError, EncodeError } from "../errors.js";
import { codecLogger } from "../logger.js";
import { decodeValue, encodeValue } from "./values.js";

import type { Schema, TypedRow } from "../types/index.js";

/**
 * Decode the fields of one record, given in schema column order. Missing
 * trailing fields count as empty.
 */
export function decodeRow(
  fields: readonly string[],
  schema: Schema,
  rowIndex?: number
): TypedRow {
  if (fields.length > schema.columns.length) {
    const error = new DecodeError(
      "*",
      fields.join(schema.csv.delimiter),
      `expected at most ${schema.columns.length} fields, got ${fields.length}`
    );
    throw rowIndex === undefined ? error : error.atRow(rowIndex);
  }

  const row: TypedRow = {};

  for (const column of schema.columns) {
    const raw = fields[column.position] ?? "";
    try {
      row[column.name] = decodeValue(raw, column);
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;

      if (
        column.timezoneLookup &&
        (column.type === "date" || column.type === "datetime")
      ) {
        // Re-derived by the timezone resolver
        codecLogger.debug(
          { column: column.name, raw, rowIndex },
          "Lookup column left absent"
        );
        row[column.name] = null;
        continue;
      }

      throw rowIndex === undefined ? error : error.atRow(rowIndex);
    }
  }

  return row;
}

/**
 * Encode a row to text fields in schema column order. Columns missing from
 * the row encode as absent; keys the schema does not declare are rejected.
 */
export function encodeRow(row: TypedRow, schema: Schema): string[] {
  for (const name of Object.keys(row)) {
    if (!schema.columns.some((c) => c.name === name)) {
      throw new EncodeError(name, `not a column of ${schema.dialect}`);
    }
  }

  return schema.columns.map((column) =>
    encodeValue(row[column.name] ?? null, column)
  );
}

/** Row with every column absent (merge-key strings empty) */
export function emptyRow(schema: Schema): TypedRow {
  const row: TypedRow = {};
  for (const column of schema.columns) {
    row[column.name] =
      column.type === "string" && column.mergeKey ? "" : null;
  }
  return row;
}
