/**
 * Merge Engine - keyed upsert of an incoming batch into an existing dataset
 *
 * Algorithm:
 * 1. Key every incoming row by the schema's merge-key columns; a key seen
 *    twice in the batch is a MergeError.
 * 2. With a window, drop existing rows whose window column lies in it.
 * 3. An incoming row whose key matches a surviving row replaces that row
 *    whole, in place; any other incoming row is appended.
 * 4. Appended rows are sorted by the schema's orderBy columns (ties keep
 *    incoming order), then the sequence column is renumbered 1..n.
 *
 * The existing dataset is never modified.
 */

import {
  compareDates,
  formatDate,
  isCalendarDate,
  isWithin,
} from "../../codec/temporal.js";
import { Dataset, keyOf, type KeyTuple } from "../../dataset/dataset.js";
import { MergeError } from "../../errors.js";
import { mergeLogger } from "../../logger.js";

import type {
  DateWindow,
  Schema,
  TypedRow,
  TypedValue,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export interface MergeResult {
  dataset: Dataset;
  /** Incoming rows appended */
  inserted: number;
  /** Existing rows replaced by an incoming row with the same key */
  replaced: number;
  /** Existing rows dropped by the window */
  removed: number;
}

// ============================================================================
// Window
// ============================================================================

function describeWindow(window: DateWindow): string {
  const after = window.after !== undefined ? formatDate(window.after) : "…";
  const before = window.before !== undefined ? formatDate(window.before) : "…";
  return `[${after}, ${before}]`;
}

function checkWindow(schema: Schema, window: DateWindow): string {
  if (
    window.after !== undefined &&
    window.before !== undefined &&
    compareDates(window.after, window.before) > 0
  ) {
    throw new MergeError(
      `Invalid window ${describeWindow(window)}: after is later than before`
    );
  }

  if (schema.windowColumn === null) {
    throw new MergeError(
      `Dialect ${schema.dialect} declares no window column; cannot merge with a window`
    );
  }
  return schema.windowColumn;
}

function inWindow(row: TypedRow, windowColumn: string, window: DateWindow): boolean {
  const value = row[windowColumn] ?? null;
  if (!isCalendarDate(value)) {
    // Absent window value: never removed
    return false;
  }
  return isWithin(value, window.after, window.before);
}

/** Rows whose window column lies in the window */
export function filterByWindow(dataset: Dataset, window: DateWindow): Dataset {
  const windowColumn = checkWindow(dataset.schema, window);
  return dataset.withRows(
    dataset.rows.filter((row) => inWindow(row, windowColumn, window))
  );
}

// ============================================================================
// Ordering
// ============================================================================

function rank(value: TypedValue): number {
  switch (typeof value) {
    case "string":
      return 0;
    case "number":
      return value;
    case "boolean":
      return value ? 1 : 0;
    default:
      return value.kind === "timedelta" ? value.minutes : 0;
  }
}

/** Ascending comparison; absent sorts before present */
export function compareValues(
  a: TypedValue | null,
  b: TypedValue | null
): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (
    typeof a === "object" &&
    typeof b === "object" &&
    a.kind !== "timedelta" &&
    b.kind !== "timedelta"
  ) {
    return compareDates(a, b);
  }
  return rank(a) - rank(b);
}

function sortAppended(
  schema: Schema,
  appended: readonly TypedRow[]
): TypedRow[] {
  const orderBy = schema.orderBy;
  return appended
    .map((row, order) => ({ row, order }))
    .sort((x, y) => {
      for (const name of orderBy) {
        const diff = compareValues(x.row[name] ?? null, y.row[name] ?? null);
        if (diff !== 0) return diff;
      }
      return x.order - y.order;
    })
    .map(({ row }) => row);
}

function renumber(schema: Schema, rows: readonly TypedRow[]): TypedRow[] {
  const sequence = schema.sequenceColumn;
  if (sequence === null) return [...rows];
  return rows.map((row, i) =>
    row[sequence] === i + 1 ? row : { ...row, [sequence]: i + 1 }
  );
}

// ============================================================================
// Merge
// ============================================================================

function keyIncoming(
  existing: Dataset,
  incoming: readonly TypedRow[]
): KeyTuple[] {
  const seen = new Map<KeyTuple, number>();

  return incoming.map((row, i) => {
    const key = keyOf(row, existing.keyColumns);
    const first = seen.get(key);
    if (first !== undefined) {
      throw new MergeError(
        `Incoming rows ${String(first)} and ${String(i)} share the merge key ${key}`,
        [first, i]
      );
    }
    seen.set(key, i);
    return key;
  });
}

export function mergeDatasets(
  existing: Dataset,
  incoming: Dataset | readonly TypedRow[],
  window?: DateWindow
): MergeResult {
  const schema = existing.schema;
  const batch = incoming instanceof Dataset ? incoming.rows : incoming;

  if (incoming instanceof Dataset && incoming.schema.dialect !== schema.dialect) {
    throw new MergeError(
      `Cannot merge ${incoming.schema.dialect} rows into a ${schema.dialect} dataset`
    );
  }
  if (existing.keyColumns.length === 0) {
    throw new MergeError(`Dialect ${schema.dialect} declares no merge key`);
  }

  const keys = keyIncoming(existing, batch);

  // Window removal
  let survivors: TypedRow[] = [...existing.rows];
  let removed = 0;
  if (window !== undefined) {
    const windowColumn = checkWindow(schema, window);
    survivors = existing.rows.filter((row) => !inWindow(row, windowColumn, window));
    removed = existing.size - survivors.length;
    mergeLogger.info(
      { window: describeWindow(window), removed },
      "Removed existing rows in window"
    );
  }

  const positions = new Map<KeyTuple, number>();
  survivors.forEach((row, position) => {
    positions.set(existing.keyOf(row), position);
  });

  // Replace or append
  let replaced = 0;
  const appended: TypedRow[] = [];
  batch.forEach((row, i) => {
    const key = keys[i] ?? existing.keyOf(row);
    const position = positions.get(key);
    if (position === undefined) {
      appended.push({ ...row });
    } else {
      survivors[position] = { ...row };
      replaced++;
    }
  });

  const rows = renumber(schema, [...survivors, ...sortAppended(schema, appended)]);
  const dataset = existing.withRows(rows);

  mergeLogger.info(
    {
      existing: existing.size,
      incoming: batch.length,
      inserted: appended.length,
      replaced,
      removed,
      total: dataset.size,
    },
    "Merge complete"
  );

  return { dataset, inserted: appended.length, replaced, removed };
}
