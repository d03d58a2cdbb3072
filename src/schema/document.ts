/**
 * TypeBox shape of a schema document (data/schemas/<dialect>.json)
 */

import { Type, type Static } from "@sinclair/typebox";

// ============================================================================
// Column Schemas
// ============================================================================

export const SideSchema = Type.Union([
  Type.Literal("departure"),
  Type.Literal("arrival"),
]);

export const ColumnDocumentSchema = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    // Checked against COLUMN_TYPES by the registry for a precise message
    type: Type.String(),
    mergeKey: Type.Optional(Type.Boolean()),
    side: Type.Optional(SideSchema),
    provenance: Type.Optional(
      Type.Union([Type.String(), Type.Array(Type.String(), { minItems: 1 })])
    ),
    timezoneLookup: Type.Optional(Type.Boolean()),
    required: Type.Optional(Type.Boolean()),
    format: Type.Optional(Type.String()),
    unit: Type.Optional(Type.Union([Type.Literal("km"), Type.Literal("miles")])),
    valueMap: Type.Optional(Type.Record(Type.String(), Type.String())),
    default: Type.Optional(Type.String()),
    notes: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);

export type ColumnDocument = Static<typeof ColumnDocumentSchema>;

// ============================================================================
// Document Schema
// ============================================================================

export const DocumentHeaderSchema = Type.Object(
  {
    version: Type.Integer({ minimum: 1 }),
    source: Type.String(),
    url: Type.Optional(Type.String()),
    encoding: Type.Literal("utf-8"),
    delimiter: Type.String({ minLength: 1, maxLength: 1 }),
    recordDelimiter: Type.Union([Type.Literal("\r\n"), Type.Literal("\n")]),
    header: Type.Boolean(),
    strictHeader: Type.Optional(Type.Boolean()),
    windowColumn: Type.Optional(Type.String()),
    orderBy: Type.Optional(Type.Array(Type.String())),
    sequenceColumn: Type.Optional(Type.String()),
    sideSuffixes: Type.Optional(
      Type.Object({
        departure: Type.String({ minLength: 1 }),
        arrival: Type.String({ minLength: 1 }),
      })
    ),
    notes: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);

export const SchemaDocumentSchema = Type.Object(
  {
    document: DocumentHeaderSchema,
    columns: Type.Array(ColumnDocumentSchema, { minItems: 1 }),
  },
  { additionalProperties: false }
);

export type SchemaDocument = Static<typeof SchemaDocumentSchema>;
