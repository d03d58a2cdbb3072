// Flight log domain types
// Schemas are loaded from data/schemas/<dialect>.json; see src/schema/registry.ts

// =====================
// Schema Types
// =====================

export type ColumnType =
  | "string"
  | "date"
  | "datetime"
  | "timedelta"
  | "integer"
  | "float"
  | "boolean";

export type Side = "departure" | "arrival";

export type DistanceUnit = "km" | "miles";

/**
 * Fixed set of dialects. `flights` is the canonical store; `openflights` and
 * `myflightpath` are export targets; `airports` (OurAirports) and `aircraft`
 * (type designators) are read-only references.
 */
export type Dialect =
  | "flights"
  | "openflights"
  | "myflightpath"
  | "airports"
  | "aircraft";

export const DIALECTS: readonly Dialect[] = [
  "flights",
  "openflights",
  "myflightpath",
  "airports",
  "aircraft",
];

export const EXPORT_DIALECTS = ["openflights", "myflightpath"] as const;
export type ExportDialect = (typeof EXPORT_DIALECTS)[number];

export interface ColumnDefinition {
  name: string;
  type: ColumnType;
  /** Zero-based position in the declared column order */
  position: number;
  mergeKey: boolean;
  side: Side | null;
  /**
   * Upstream field(s) that populate this column. For canonical and reference
   * dialects a single tag such as "lat" or "iata"; for export dialects the
   * canonical column names to read, first present value wins.
   */
  provenance: readonly string[];
  timezoneLookup: boolean;
  required: boolean;
  format: string | null;
  unit: DistanceUnit | null;
  valueMap: Readonly<Record<string, string>> | null;
  default: string | null;
  notes: string | null;
}

export interface CsvDialect {
  delimiter: string;
  recordDelimiter: string;
  header: boolean;
  /** Header must list exactly the schema columns, in order */
  strictHeader: boolean;
}

export interface Schema {
  dialect: Dialect;
  version: number;
  source: string;
  url: string | null;
  csv: CsvDialect;
  columns: readonly ColumnDefinition[];
  /** Date column filtered by merge replace windows */
  windowColumn: string | null;
  /** Sort order applied to rows appended by a merge */
  orderBy: readonly string[];
  /** 1-based row number column renumbered after a merge */
  sequenceColumn: string | null;
  sideSuffixes: Readonly<Record<Side, string>> | null;
}

// =====================
// Typed Values
// =====================

export interface CalendarDate {
  readonly kind: "date";
  year: number;
  month: number;
  day: number;
}

/**
 * Naive wall-clock timestamp at the airport; carries no offset. Offsets live
 * in the gmtoffset columns and are applied only when comparing across sides.
 */
export interface LocalDateTime {
  readonly kind: "datetime";
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

export interface Duration {
  readonly kind: "timedelta";
  minutes: number;
}

export type TypedValue =
  | string
  | number
  | boolean
  | CalendarDate
  | LocalDateTime
  | Duration;

/** Column name → value; null means absent */
export type TypedRow = Record<string, TypedValue | null>;

// =====================
// Merge Types
// =====================

/** Inclusive date range; a missing bound is unbounded on that side */
export interface DateWindow {
  after?: CalendarDate;
  before?: CalendarDate;
}

// =====================
// Timezone Types
// =====================

export interface TimezoneInfo {
  tzid: string;
  /** Hours east of UTC at the queried date */
  gmtOffset: number;
}

/**
 * External timezone collaborator. Implementations throw QuotaExceededError,
 * LookupAuthError, TimezoneNotFoundError or TransientLookupError.
 */
export interface TimezoneLookup {
  lookup(lat: number, lon: number, date: CalendarDate): Promise<TimezoneInfo>;
}
