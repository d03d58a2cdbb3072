/**
 * Typed value codec - one textual CSV field ⇄ one typed value
 *
 * Canonical text forms:
 *   date       YYYY-MM-DD
 *   datetime   YYYY-MM-DD HH:MM
 *   timedelta  HH:MM (hours may exceed 24)
 *   boolean    True / False
 */

import { DecodeError, EncodeError } from "../errors.js";
import {
  formatDate,
  formatDateTime,
  formatDuration,
  isCalendarDate,
  isDuration,
  isLocalDateTime,
  isValidCalendarDate,
  makeDate,
  makeDateTime,
  makeDuration,
} from "./temporal.js";

import type { ColumnDefinition, TypedValue } from "../types/index.js";

// ============================================================================
// Parsing Patterns
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/;
const DURATION_PATTERN = /^([+-]?)(\d+):(\d{2})(?::(\d{2}))?$/;
const INTEGER_PATTERN = /^[+-]?\d+(?:\.0+)?$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const BOOLEAN_TOKENS: Record<string, boolean> = {
  true: true,
  yes: true,
  "1": true,
  false: false,
  no: false,
  "0": false,
};

// ============================================================================
// Decoding
// ============================================================================

/**
 * Decode one field for a column. Empty text decodes to null (absent), except
 * for merge-key strings, which decode to "" so key tuples stay comparable.
 */
export function decodeValue(
  raw: string,
  column: ColumnDefinition
): TypedValue | null {
  const text = raw.trim();

  if (text === "") {
    return column.type === "string" && column.mergeKey ? "" : null;
  }

  switch (column.type) {
    case "string":
      return raw;
    case "date":
      return decodeDate(text, column);
    case "datetime":
      return decodeDateTime(text, column);
    case "timedelta":
      return decodeDuration(text, column);
    case "integer":
      return decodeInteger(text, column);
    case "float":
      return decodeFloat(text, column);
    case "boolean":
      return decodeBoolean(text, column);
  }
}

function decodeDate(text: string, column: ColumnDefinition): TypedValue {
  // Timestamps written by older exports carry a midnight time part
  const match = DATE_PATTERN.exec(text) ?? DATETIME_PATTERN.exec(text);
  if (match === null) {
    throw new DecodeError(column.name, text, "expected YYYY-MM-DD");
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (!isValidCalendarDate(year, month, day)) {
    throw new DecodeError(column.name, text, "not a calendar date");
  }

  return makeDate(year, month, day);
}

function decodeDateTime(text: string, column: ColumnDefinition): TypedValue {
  const match = DATETIME_PATTERN.exec(text);
  if (match === null) {
    throw new DecodeError(column.name, text, "expected YYYY-MM-DD HH:MM");
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);

  if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59) {
    throw new DecodeError(column.name, text, "not a valid timestamp");
  }

  return makeDateTime(year, month, day, hour, minute);
}

function decodeDuration(text: string, column: ColumnDefinition): TypedValue {
  const match = DURATION_PATTERN.exec(text);
  if (match === null) {
    throw new DecodeError(column.name, text, "expected HH:MM");
  }

  const minutes = Number(match[3]);
  if (minutes > 59) {
    throw new DecodeError(column.name, text, "minutes must be below 60");
  }

  const total = Number(match[2]) * 60 + minutes;
  if (match[1] === "-" && total > 0) {
    throw new DecodeError(column.name, text, "durations cannot be negative");
  }

  return makeDuration(total);
}

function decodeInteger(text: string, column: ColumnDefinition): TypedValue {
  const normalized = text.replaceAll(",", "");
  if (!INTEGER_PATTERN.test(normalized)) {
    throw new DecodeError(column.name, text, "not an integer");
  }
  const value = Number.parseInt(normalized, 10);
  if (!Number.isSafeInteger(value)) {
    throw new DecodeError(column.name, text, "integer out of range");
  }
  return value;
}

function decodeFloat(text: string, column: ColumnDefinition): TypedValue {
  if (!FLOAT_PATTERN.test(text)) {
    throw new DecodeError(column.name, text, "not a number");
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new DecodeError(column.name, text, "number out of range");
  }
  return value;
}

function decodeBoolean(text: string, column: ColumnDefinition): TypedValue {
  const value = BOOLEAN_TOKENS[text.toLowerCase()];
  if (value === undefined) {
    throw new DecodeError(
      column.name,
      text,
      "expected one of true/false/yes/no/1/0"
    );
  }
  return value;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode one typed value to its canonical text. Absent encodes to "".
 */
export function encodeValue(
  value: TypedValue | null,
  column: ColumnDefinition
): string {
  if (value === null) {
    return "";
  }

  switch (column.type) {
    case "string":
      if (typeof value === "string") return value;
      break;
    case "date":
      if (isCalendarDate(value)) return formatDate(value);
      break;
    case "datetime":
      if (isLocalDateTime(value)) return formatDateTime(value);
      break;
    case "timedelta":
      if (isDuration(value) && value.minutes >= 0) return formatDuration(value);
      break;
    case "integer":
      if (typeof value === "number" && Number.isInteger(value)) {
        return String(value);
      }
      break;
    case "float":
      if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
      }
      break;
    case "boolean":
      if (typeof value === "boolean") return value ? "True" : "False";
      break;
  }

  throw new EncodeError(
    column.name,
    `value ${JSON.stringify(value)} does not fit type ${column.type}`
  );
}
