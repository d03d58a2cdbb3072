/**
 * CSV file I/O for typed datasets
 *
 * Reading maps header names onto schema columns; writing always emits the
 * schema's declared column order. Writes go through a temporary sibling
 * file and a rename, so the target path holds either the previous content
 * or the complete new one.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { Dataset } from "../dataset/dataset.js";
import { DecodeError, errorMessage } from "../errors.js";
import { codecLogger } from "../logger.js";
import { decodeRow, encodeRow } from "./rows.js";

import type { Schema, TypedRow } from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

/** What to do with a record that fails to decode */
export type DecodePolicy = "abort" | "skip";

export interface ReadDatasetOptions {
  onDecodeError?: DecodePolicy;
}

export interface ReadDatasetResult {
  dataset: Dataset;
  /** Records dropped under the "skip" policy */
  skipped: DecodeError[];
}

// ============================================================================
// In-memory forms
// ============================================================================

/**
 * Parse CSV text into records of raw fields. The header record, if any, is
 * returned as the first record.
 */
export function parseCsv(content: string, schema: Schema): string[][] {
  const parsed: unknown = parse(content, {
    delimiter: schema.csv.delimiter,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isRecordList(parsed)) {
    throw new DecodeError("*", "", "CSV parser returned unexpected records");
  }
  return parsed;
}

export function stringifyCsv(
  header: readonly string[] | null,
  records: readonly (readonly string[])[],
  schema: Schema
): string {
  const all = header === null ? records : [header, ...records];
  return stringify(
    all.map((record) => [...record]),
    {
      delimiter: schema.csv.delimiter,
      record_delimiter: schema.csv.recordDelimiter,
    }
  );
}

function isRecordList(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (record) =>
        Array.isArray(record) &&
        record.every((field) => typeof field === "string")
    )
  );
}

// ============================================================================
// Header mapping
// ============================================================================

/**
 * Position of each schema column within the file's records, or -1 when the
 * file lacks the column.
 */
function mapHeader(header: readonly string[], schema: Schema): number[] {
  const names = header.map((name) => name.trim());

  if (schema.csv.strictHeader) {
    const expected = schema.columns.map((c) => c.name);
    const matches =
      names.length === expected.length &&
      names.every((name, i) => name === expected[i]);
    if (!matches) {
      throw new DecodeError(
        "*",
        names.join(schema.csv.delimiter),
        `header does not match the ${schema.dialect} columns (${expected.join(", ")})`
      );
    }
    return expected.map((_, i) => i);
  }

  return schema.columns.map((column) => names.indexOf(column.name));
}

// ============================================================================
// Dataset files
// ============================================================================

/**
 * Decode a dataset from parsed records. Row indices in errors are zero-based
 * positions among the data records.
 */
export function decodeRecords(
  records: readonly (readonly string[])[],
  schema: Schema,
  options: ReadDatasetOptions = {}
): ReadDatasetResult {
  const policy = options.onDecodeError ?? "abort";

  let body = records;
  let positions = schema.columns.map((_, i) => i);
  if (schema.csv.header) {
    const [header, ...rest] = records;
    if (header === undefined) {
      return { dataset: Dataset.empty(schema), skipped: [] };
    }
    positions = mapHeader(header, schema);
    body = rest;
  }

  const rows: TypedRow[] = [];
  const skipped: DecodeError[] = [];

  // Canonical files carry exactly the declared columns on every record
  const width = schema.csv.strictHeader ? positions.length : null;

  body.forEach((record, rowIndex) => {
    const fields = positions.map((p) => (p < 0 ? "" : (record[p] ?? "")));
    try {
      if (width !== null && record.length !== width) {
        throw new DecodeError(
          "*",
          record.join(schema.csv.delimiter),
          `expected ${String(width)} fields, got ${String(record.length)}`
        ).atRow(rowIndex);
      }
      rows.push(decodeRow(fields, schema, rowIndex));
    } catch (error) {
      if (policy === "skip" && error instanceof DecodeError) {
        codecLogger.warn({ rowIndex, error: error.message }, "Skipping row");
        skipped.push(error);
        return;
      }
      throw error;
    }
  });

  return { dataset: new Dataset(schema, rows), skipped };
}

export function readDataset(
  path: string,
  schema: Schema,
  options: ReadDatasetOptions = {}
): ReadDatasetResult {
  codecLogger.debug({ path, dialect: schema.dialect }, "Reading dataset");

  const content = readFileSync(path, "utf-8");
  const result = decodeRecords(parseCsv(content, schema), schema, options);

  codecLogger.info(
    {
      path,
      rows: result.dataset.size,
      skipped: result.skipped.length,
    },
    "Dataset read"
  );

  return result;
}

/**
 * Replace the file at `path` with `content` through a temporary sibling and
 * a rename.
 */
export function writeFileAtomic(path: string, content: string): void {
  const tmpPath = join(
    dirname(path),
    `.${basename(path)}.${String(process.pid)}.tmp`
  );

  try {
    writeFileSync(tmpPath, content, "utf-8");
    renameSync(tmpPath, path);
  } catch (error) {
    if (existsSync(tmpPath)) {
      rmSync(tmpPath, { force: true });
    }
    codecLogger.error({ path, error: errorMessage(error) }, "Write failed");
    throw error;
  }
}

/** Write header + records atomically */
export function writeRecords(
  path: string,
  header: readonly string[] | null,
  records: readonly (readonly string[])[],
  schema: Schema
): void {
  writeFileAtomic(path, stringifyCsv(header, records, schema));
  codecLogger.info({ path, records: records.length }, "File written");
}

export function writeDataset(path: string, dataset: Dataset): void {
  const { schema } = dataset;
  const records = dataset.rows.map((row) => encodeRow(row, schema));
  const header = schema.csv.header ? schema.columns.map((c) => c.name) : null;
  writeRecords(path, header, records, schema);
}
