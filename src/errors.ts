/**
 * Error taxonomy for the flight log pipeline
 *
 * Every stage throws a subclass of FlightlogError carrying a stable `code`,
 * so callers (CLI commands, tests) can branch on the code instead of
 * matching messages.
 */

export abstract class FlightlogError extends Error {
  abstract readonly code: string;
}

// ============================================================================
// Fatal errors
// ============================================================================

export class SchemaError extends FlightlogError {
  readonly code = "SCHEMA_ERROR" as const;

  constructor(
    message: string,
    public readonly dialect?: string
  ) {
    super(dialect !== undefined ? `[${dialect}] ${message}` : message);
    this.name = "SchemaError";
  }
}

export class ConfigError extends FlightlogError {
  readonly code = "CONFIG_ERROR" as const;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class MergeError extends FlightlogError {
  readonly code = "MERGE_ERROR" as const;

  constructor(
    message: string,
    public readonly rowIndices: number[] = []
  ) {
    super(message);
    this.name = "MergeError";
  }
}

// ============================================================================
// Row-level errors
// ============================================================================

export class DecodeError extends FlightlogError {
  readonly code = "DECODE_ERROR" as const;
  rowIndex?: number;

  constructor(
    public readonly column: string,
    public readonly raw: string,
    reason: string
  ) {
    super(`Cannot decode column '${column}' from '${raw}': ${reason}`);
    this.name = "DecodeError";
  }

  /** Attach the row position once the caller knows it */
  atRow(rowIndex: number): this {
    this.rowIndex = rowIndex;
    this.message = `Row ${String(rowIndex)}: ${this.message}`;
    return this;
  }
}

export class EncodeError extends FlightlogError {
  readonly code = "ENCODE_ERROR" as const;

  constructor(
    public readonly column: string,
    reason: string
  ) {
    super(`Cannot encode column '${column}': ${reason}`);
    this.name = "EncodeError";
  }
}

export class ExportError extends FlightlogError {
  readonly code = "EXPORT_ERROR" as const;

  constructor(
    public readonly rowIndex: number,
    public readonly columns: string[],
    reason: string
  ) {
    super(`Row ${String(rowIndex)} excluded: ${reason}`);
    this.name = "ExportError";
  }
}

// ============================================================================
// Timezone lookup errors
// ============================================================================

/**
 * Failure for a single coordinate pair. The resolver records it and moves
 * on to the next pair.
 */
export class ResolutionError extends FlightlogError {
  readonly code: string = "RESOLUTION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ResolutionError";
  }
}

export class TimezoneNotFoundError extends ResolutionError {
  override readonly code = "TIMEZONE_NOT_FOUND";

  constructor(message: string) {
    super(message);
    this.name = "TimezoneNotFoundError";
  }
}

export class TransientLookupError extends ResolutionError {
  override readonly code = "TRANSIENT_LOOKUP_ERROR";

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "TransientLookupError";
  }
}

/**
 * The lookup service refuses every further call for now. The resolver stops
 * issuing calls and returns what it has.
 */
export abstract class LookupStopError extends FlightlogError {
  abstract readonly reason: "quota" | "auth";
}

export class QuotaExceededError extends LookupStopError {
  readonly code = "QUOTA_EXCEEDED" as const;
  readonly reason = "quota" as const;

  constructor(message: string) {
    super(message);
    this.name = "QuotaExceededError";
  }
}

export class LookupAuthError extends LookupStopError {
  readonly code = "LOOKUP_AUTH_ERROR" as const;
  readonly reason = "auth" as const;

  constructor(message: string) {
    super(message);
    this.name = "LookupAuthError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
