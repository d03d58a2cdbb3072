/**
 * Format Exporter - canonical rows → rows of an export dialect
 *
 * Each target column names its canonical source column(s) through
 * `provenance`; the first present value wins. Values then pass through the
 * column's conversions in order: unit, `format` pattern or canonical text,
 * `valueMap`, `default`. A row whose `required` column ends up empty is
 * excluded and reported; the remaining rows still export.
 */

import { formatPattern } from "../../codec/temporal.js";
import { convertDistance, parseDistanceUnit } from "../../codec/units.js";
import { encodeValue } from "../../codec/values.js";
import { EncodeError, ExportError, SchemaError } from "../../errors.js";
import { exportLogger } from "../../logger.js";
import { findColumnByProvenance } from "../../schema/columns.js";

import type { Dataset } from "../../dataset/dataset.js";
import type {
  ColumnDefinition,
  DistanceUnit,
  Schema,
  TypedRow,
  TypedValue,
} from "../../types/index.js";

export interface ExportResult {
  header: string[];
  records: string[][];
  excluded: ExportError[];
}

interface Mapping {
  target: ColumnDefinition;
  sources: ColumnDefinition[];
}

// ============================================================================
// Mapping
// ============================================================================

function buildMappings(source: Schema, target: Schema): Mapping[] {
  const byName = new Map(source.columns.map((c) => [c.name, c]));

  return target.columns.map((column) => {
    const sources = column.provenance.map((name) => {
      const found = byName.get(name);
      if (found === undefined) {
        throw new SchemaError(
          `Column '${column.name}' reads unknown ${source.dialect} column '${name}'`,
          target.dialect
        );
      }
      return found;
    });
    return { target: column, sources };
  });
}

function firstPresent(
  row: TypedRow,
  sources: readonly ColumnDefinition[]
): { value: TypedValue; column: ColumnDefinition } | null {
  for (const column of sources) {
    const value = row[column.name] ?? null;
    if (value !== null && value !== "") {
      return { value, column };
    }
  }
  return null;
}

// ============================================================================
// Conversion
// ============================================================================

function sourceUnit(
  row: TypedRow,
  column: ColumnDefinition,
  unitColumn: ColumnDefinition | undefined
): DistanceUnit | null {
  if (column.provenance.includes("distance") && unitColumn !== undefined) {
    const label = row[unitColumn.name] ?? null;
    const parsed = typeof label === "string" ? parseDistanceUnit(label) : null;
    if (parsed !== null) return parsed;
  }
  return column.unit;
}

function convert(
  row: TypedRow,
  found: { value: TypedValue; column: ColumnDefinition },
  target: ColumnDefinition,
  unitColumn: ColumnDefinition | undefined
): string {
  let value = found.value;

  if (typeof value === "number" && target.unit !== null) {
    const from = sourceUnit(row, found.column, unitColumn) ?? target.unit;
    value = convertDistance(value, from, target.unit);
  }

  let text: string;
  if (typeof value === "object" && target.format !== null) {
    text = formatPattern(value, target.format);
  } else if (typeof value === "number" && target.type === "integer") {
    text = String(Math.trunc(value));
  } else if (target.type === "string") {
    text = encodeValue(value, found.column);
  } else {
    text = encodeValue(value, target);
  }

  return target.valueMap?.[text] ?? text;
}

// ============================================================================
// Export
// ============================================================================

export function exportDataset(dataset: Dataset, target: Schema): ExportResult {
  const mappings = buildMappings(dataset.schema, target);
  const unitColumn = findColumnByProvenance(dataset.schema, "distance_unit");

  const header = target.columns.map((c) => c.name);
  const records: string[][] = [];
  const excluded: ExportError[] = [];

  dataset.rows.forEach((row, rowIndex) => {
    const record: string[] = [];
    const missing: string[] = [];

    try {
      for (const { target: column, sources } of mappings) {
        const found = firstPresent(row, sources);
        const text =
          found === null ? "" : convert(row, found, column, unitColumn);
        const value = text === "" ? (column.default ?? "") : text;

        if (column.required && value === "") {
          missing.push(column.name);
        }
        record.push(value);
      }
    } catch (error) {
      if (!(error instanceof EncodeError)) throw error;
      excluded.push(new ExportError(rowIndex, [error.column], error.message));
      return;
    }

    if (missing.length > 0) {
      excluded.push(
        new ExportError(
          rowIndex,
          missing,
          `missing required ${missing.join(", ")}`
        )
      );
      return;
    }

    records.push(record);
  });

  for (const error of excluded) {
    exportLogger.warn({ rowIndex: error.rowIndex, columns: error.columns }, error.message);
  }
  exportLogger.info(
    {
      dialect: target.dialect,
      exported: records.length,
      excluded: excluded.length,
    },
    "Export complete"
  );

  return { header, records, excluded };
}
