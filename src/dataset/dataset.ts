/**
 * Dataset - a schema, its ordered rows and the merge-key index over them
 *
 * Datasets are values: every pipeline stage builds a new one instead of
 * editing rows in place. The key index is derived in the constructor.
 */

import { encodeValue } from "../codec/values.js";
import { MergeError } from "../errors.js";
import { mergeKeyColumns } from "../schema/columns.js";

import type { ColumnDefinition, Schema, TypedRow } from "../types/index.js";

/** Serialized merge-key tuple; absent components are null */
export type KeyTuple = string;

export function keyOf(
  row: TypedRow,
  keyColumns: readonly ColumnDefinition[]
): KeyTuple {
  return JSON.stringify(
    keyColumns.map((column) => {
      const value = row[column.name] ?? null;
      return value === null ? null : encodeValue(value, column);
    })
  );
}

export class Dataset {
  readonly rows: readonly TypedRow[];
  readonly keyColumns: readonly ColumnDefinition[];
  private readonly index: ReadonlyMap<KeyTuple, number>;

  constructor(
    readonly schema: Schema,
    rows: readonly TypedRow[]
  ) {
    this.rows = Object.freeze([...rows]);
    this.keyColumns = mergeKeyColumns(schema);

    // Reference and export dialects declare no key and are not indexed
    const index = new Map<KeyTuple, number>();
    const keyed = this.keyColumns.length > 0;
    this.rows.forEach((row, position) => {
      if (!keyed) return;
      const key = keyOf(row, this.keyColumns);
      const previous = index.get(key);
      if (previous !== undefined) {
        throw new MergeError(
          `Rows ${String(previous)} and ${String(position)} share the merge key ${key}`,
          [previous, position]
        );
      }
      index.set(key, position);
    });
    this.index = index;
  }

  static empty(schema: Schema): Dataset {
    return new Dataset(schema, []);
  }

  get size(): number {
    return this.rows.length;
  }

  keyOf(row: TypedRow): KeyTuple {
    return keyOf(row, this.keyColumns);
  }

  /** Position of the row with this key, or undefined */
  positionOf(key: KeyTuple): number | undefined {
    return this.index.get(key);
  }

  has(key: KeyTuple): boolean {
    return this.index.has(key);
  }

  /** New dataset over the same schema */
  withRows(rows: readonly TypedRow[]): Dataset {
    return new Dataset(this.schema, rows);
  }
}
