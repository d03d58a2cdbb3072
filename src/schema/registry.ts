/**
 * Schema Registry - declarative column schemas per dialect
 *
 * Each dialect is described by a JSON document under data/schemas/. Documents
 * are validated twice: structurally with TypeBox, then semantically (types,
 * unique names, departure/arrival pairing, merge window and ordering
 * columns). A loaded schema is deep-frozen and cached for the process.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { Value } from "@sinclair/typebox/value";

import { SchemaError, errorMessage } from "../errors.js";
import { schemaLogger } from "../logger.js";
import { SchemaDocumentSchema, type ColumnDocument } from "./document.js";

import type {
  ColumnDefinition,
  ColumnType,
  Dialect,
  Schema,
  Side,
} from "../types/index.js";

// ============================================================================
// Constants
// ============================================================================

export const COLUMN_TYPES: readonly ColumnType[] = [
  "string",
  "date",
  "datetime",
  "timedelta",
  "integer",
  "float",
  "boolean",
];

const OTHER_SIDE: Record<Side, Side> = {
  departure: "arrival",
  arrival: "departure",
};

const cache = new Map<string, Schema>();

// ============================================================================
// Loading
// ============================================================================

/**
 * Locate data/schemas relative to this module, both when running from
 * sources (src/schema) and from the build output (dist/src/schema).
 */
export function defaultSchemaDir(): string {
  const candidates = ["../../data/schemas", "../../../data/schemas"].map(
    (rel) => fileURLToPath(new URL(rel, import.meta.url))
  );
  return candidates.find((dir) => existsSync(dir)) ?? candidates[0] ?? ".";
}

export interface LoadSchemaOptions {
  schemaDir?: string;
}

/**
 * Load the schema of a dialect, reading and validating its document on
 * first use.
 */
export function loadSchema(
  dialect: Dialect,
  options: LoadSchemaOptions = {}
): Schema {
  const schemaDir = options.schemaDir ?? defaultSchemaDir();
  const cacheKey = `${schemaDir}:${dialect}`;

  const cached = cache.get(cacheKey);
  if (cached !== undefined) {
    return cached;
  }

  const filePath = join(schemaDir, `${dialect}.json`);
  schemaLogger.debug({ dialect, filePath }, "Loading schema document");

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new SchemaError(
      `Cannot read schema document ${filePath}: ${errorMessage(error)}`,
      dialect
    );
  }

  const schema = parseSchema(dialect, document);
  cache.set(cacheKey, schema);

  schemaLogger.info(
    {
      dialect,
      columns: schema.columns.length,
      mergeKeys: schema.columns.filter((c) => c.mergeKey).length,
    },
    "Schema loaded"
  );

  return schema;
}

/** Drop cached schemas (tests, or after editing documents) */
export function clearSchemaCache(): void {
  cache.clear();
}

// ============================================================================
// Parsing & Validation
// ============================================================================

/**
 * Validate an in-memory schema document and build the frozen Schema.
 */
export function parseSchema(dialect: Dialect, document: unknown): Schema {
  if (!Value.Check(SchemaDocumentSchema, document)) {
    const problems = [...Value.Errors(SchemaDocumentSchema, document)]
      .slice(0, 5)
      .map((e) => `${e.path === "" ? "/" : e.path}: ${e.message}`);
    throw new SchemaError(
      `Invalid schema document: ${problems.join("; ")}`,
      dialect
    );
  }

  const header = document.document;
  const columns = document.columns.map((doc, position) =>
    buildColumn(dialect, doc, position)
  );

  const names = new Set<string>();
  for (const column of columns) {
    if (names.has(column.name)) {
      throw new SchemaError(`Duplicate column name '${column.name}'`, dialect);
    }
    names.add(column.name);
  }

  const schema: Schema = {
    dialect,
    version: header.version,
    source: header.source,
    url: header.url ?? null,
    csv: {
      delimiter: header.delimiter,
      recordDelimiter: header.recordDelimiter,
      header: header.header,
      strictHeader: header.strictHeader ?? false,
    },
    columns,
    windowColumn: header.windowColumn ?? null,
    orderBy: header.orderBy ?? [],
    sequenceColumn: header.sequenceColumn ?? null,
    sideSuffixes: header.sideSuffixes ?? null,
  };

  checkSidePairs(schema);
  checkDocumentColumns(schema);

  return deepFreeze(schema);
}

function buildColumn(
  dialect: Dialect,
  doc: ColumnDocument,
  position: number
): ColumnDefinition {
  const type = COLUMN_TYPES.find((t) => t === doc.type);
  if (type === undefined) {
    throw new SchemaError(
      `Column '${doc.name}' declares unknown type '${doc.type}'`,
      dialect
    );
  }

  if (doc.timezoneLookup === true && doc.side === undefined) {
    throw new SchemaError(
      `Column '${doc.name}' is used for timezone lookup but belongs to no side`,
      dialect
    );
  }

  const provenance =
    doc.provenance === undefined
      ? []
      : typeof doc.provenance === "string"
        ? [doc.provenance]
        : doc.provenance;

  return {
    name: doc.name,
    type,
    position,
    mergeKey: doc.mergeKey ?? false,
    side: doc.side ?? null,
    provenance,
    timezoneLookup: doc.timezoneLookup ?? false,
    required: doc.required ?? false,
    format: doc.format ?? null,
    unit: doc.unit ?? null,
    valueMap: doc.valueMap ?? null,
    default: doc.default ?? null,
    notes: doc.notes ?? null,
  };
}

/**
 * Identity shared by a departure column and its arrival counterpart: the
 * provenance tag when there is one, else the name without its side suffix.
 */
export function pairKey(schema: Schema, column: ColumnDefinition): string {
  if (column.provenance.length > 0) {
    return `provenance:${column.provenance.join("|")}`;
  }

  const suffix =
    column.side !== null ? schema.sideSuffixes?.[column.side] : undefined;
  const stem =
    suffix !== undefined && column.name.endsWith(suffix)
      ? column.name.slice(0, -suffix.length)
      : column.name;
  return `name:${stem}`;
}

function checkSidePairs(schema: Schema): void {
  const keysBySide: Record<Side, Set<string>> = {
    departure: new Set(),
    arrival: new Set(),
  };

  for (const column of schema.columns) {
    if (column.side !== null) {
      keysBySide[column.side].add(pairKey(schema, column));
    }
  }

  for (const column of schema.columns) {
    if (column.side === null) continue;

    const other = OTHER_SIDE[column.side];
    if (!keysBySide[other].has(pairKey(schema, column))) {
      throw new SchemaError(
        `Column '${column.name}' (${column.side}) has no ${other} counterpart`,
        schema.dialect
      );
    }
  }
}

function checkDocumentColumns(schema: Schema): void {
  const byName = new Map(schema.columns.map((c) => [c.name, c]));

  if (schema.windowColumn !== null) {
    const column = byName.get(schema.windowColumn);
    if (column === undefined) {
      throw new SchemaError(
        `Window column '${schema.windowColumn}' is not declared`,
        schema.dialect
      );
    }
    if (column.type !== "date") {
      throw new SchemaError(
        `Window column '${column.name}' must be of type date, not ${column.type}`,
        schema.dialect
      );
    }
  }

  for (const name of schema.orderBy) {
    if (!byName.has(name)) {
      throw new SchemaError(
        `Order column '${name}' is not declared`,
        schema.dialect
      );
    }
  }

  if (schema.sequenceColumn !== null) {
    const column = byName.get(schema.sequenceColumn);
    if (column?.type !== "integer") {
      throw new SchemaError(
        `Sequence column '${schema.sequenceColumn}' must be a declared integer column`,
        schema.dialect
      );
    }
    if (column.mergeKey) {
      throw new SchemaError(
        `Sequence column '${column.name}' cannot be part of the merge key`,
        schema.dialect
      );
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
