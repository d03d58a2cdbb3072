/**
 * Calendar helpers for naive dates, wall-clock timestamps and durations
 */

import type {
  CalendarDate,
  Duration,
  LocalDateTime,
  TypedValue,
} from "../types/index.js";

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): CalendarDate {
  return { kind: "date", year, month, day };
}

export function makeDateTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number
): LocalDateTime {
  return { kind: "datetime", year, month, day, hour, minute };
}

export function makeDuration(minutes: number): Duration {
  return { kind: "timedelta", minutes };
}

export function isValidCalendarDate(
  year: number,
  month: number,
  day: number
): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCDate() === day && candidate.getUTCMonth() === month - 1;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isCalendarDate(value: TypedValue | null): value is CalendarDate {
  return typeof value === "object" && value !== null && value.kind === "date";
}

export function isLocalDateTime(
  value: TypedValue | null
): value is LocalDateTime {
  return (
    typeof value === "object" && value !== null && value.kind === "datetime"
  );
}

export function isDuration(value: TypedValue | null): value is Duration {
  return (
    typeof value === "object" && value !== null && value.kind === "timedelta"
  );
}

// ============================================================================
// Arithmetic
// ============================================================================

export function dateOf(value: CalendarDate | LocalDateTime): CalendarDate {
  return makeDate(value.year, value.month, value.day);
}

/** Minutes since the epoch, treating the wall clock as if it were UTC */
export function toEpochMinutes(value: CalendarDate | LocalDateTime): number {
  const hour = value.kind === "datetime" ? value.hour : 0;
  const minute = value.kind === "datetime" ? value.minute : 0;
  return (
    Date.UTC(value.year, value.month - 1, value.day, hour, minute) / 60_000
  );
}

export function compareDates(
  a: CalendarDate | LocalDateTime,
  b: CalendarDate | LocalDateTime
): number {
  return toEpochMinutes(a) - toEpochMinutes(b);
}

/** Inclusive range check; a missing bound is open */
export function isWithin(
  value: CalendarDate,
  after: CalendarDate | undefined,
  before: CalendarDate | undefined
): boolean {
  if (after !== undefined && compareDates(value, after) < 0) return false;
  if (before !== undefined && compareDates(value, before) > 0) return false;
  return true;
}

// ============================================================================
// Formatting
// ============================================================================

export function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatDate(value: CalendarDate | LocalDateTime): string {
  return `${String(value.year).padStart(4, "0")}-${pad2(value.month)}-${pad2(value.day)}`;
}

export function formatDateTime(value: LocalDateTime): string {
  return `${formatDate(value)} ${pad2(value.hour)}:${pad2(value.minute)}`;
}

export function formatDuration(value: Duration): string {
  const sign = value.minutes < 0 ? "-" : "";
  const total = Math.abs(value.minutes);
  return `${sign}${pad2(Math.floor(total / 60))}:${pad2(total % 60)}`;
}

/**
 * Render with a pattern of YYYY, MM, DD, HH and mm tokens. Durations only
 * know HH and mm.
 */
export function formatPattern(
  value: CalendarDate | LocalDateTime | Duration,
  pattern: string
): string {
  if (value.kind === "timedelta") {
    const total = Math.abs(value.minutes);
    return pattern
      .replace("HH", pad2(Math.floor(total / 60)))
      .replace("mm", pad2(total % 60));
  }

  const hour = value.kind === "datetime" ? value.hour : 0;
  const minute = value.kind === "datetime" ? value.minute : 0;
  return pattern.replace(/YYYY|MM|DD|HH|mm/g, (token) => {
    switch (token) {
      case "YYYY":
        return String(value.year).padStart(4, "0");
      case "MM":
        return pad2(value.month);
      case "DD":
        return pad2(value.day);
      case "HH":
        return pad2(hour);
      default:
        return pad2(minute);
    }
  });
}
