/**
 * GeoNames timezone client
 *
 * Implements TimezoneLookup over the timezoneJSON web service. Requests are
 * rate limited; HTTP 429/5xx responses and network failures are retried with
 * exponential backoff. Service-level errors arrive as HTTP 200 with a
 * `status` object and are mapped onto the lookup error taxonomy:
 *
 *   10                 → LookupAuthError
 *   15                 → TimezoneNotFoundError
 *   18, 19, 20         → QuotaExceededError
 *   anything else      → TransientLookupError
 *
 * @see http://www.geonames.org/export/webservice-exception.html
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { formatDate } from "../codec/temporal.js";
import {
  LookupAuthError,
  QuotaExceededError,
  ResolutionError,
  TimezoneNotFoundError,
  TransientLookupError,
  errorMessage,
} from "../errors.js";
import { apiLogger } from "../logger.js";
import { rateLimitedFetch, sleep } from "./http.js";

import type {
  CalendarDate,
  TimezoneInfo,
  TimezoneLookup,
} from "../types/index.js";

// ============================================================================
// Configuration
// ============================================================================

export const GEONAMES_DEFAULTS = {
  url: "https://secure.geonames.org/timezoneJSON",
  timeoutMs: 10_000,
  maxRetries: 5,
  // Free accounts get 1000 credits per hour
  rateLimitMs: 1_000,
  initialBackoffMs: 1_000,
  backoffMultiplier: 2,
  maxBackoffMs: 30_000,
} as const;

export interface GeoNamesClientOptions {
  username: string;
  url?: string;
  timeoutMs?: number;
  maxRetries?: number;
  rateLimitMs?: number;
  initialBackoffMs?: number;
  backoffMultiplier?: number;
  maxBackoffMs?: number;
}

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);
const QUOTA_CODES = new Set([18, 19, 20]);
const AUTH_CODE = 10;
const NO_RESULT_CODE = 15;

// ============================================================================
// Response Schema
// ============================================================================

const GeoNamesStatusSchema = Type.Object({
  value: Type.Number(),
  message: Type.String(),
});

const GeoNamesDateSchema = Type.Object({
  date: Type.String(),
  offsetToGmt: Type.Number(),
});

export const GeoNamesResponseSchema = Type.Object({
  status: Type.Optional(GeoNamesStatusSchema),
  timezoneId: Type.Optional(Type.String()),
  gmtOffset: Type.Optional(Type.Number()),
  dates: Type.Optional(Type.Array(GeoNamesDateSchema)),
});

export type GeoNamesResponse = Static<typeof GeoNamesResponseSchema>;

// ============================================================================
// Client
// ============================================================================

export class GeoNamesClient implements TimezoneLookup {
  private readonly options: Required<GeoNamesClientOptions>;

  constructor(options: GeoNamesClientOptions) {
    this.options = { ...GEONAMES_DEFAULTS, ...options };
  }

  async lookup(
    lat: number,
    lon: number,
    date: CalendarDate
  ): Promise<TimezoneInfo> {
    const day = formatDate(date);
    const params = new URLSearchParams({
      lat: String(lat),
      lng: String(lon),
      date: day,
      username: this.options.username,
    });
    const url = `${this.options.url}?${params.toString()}`;

    apiLogger.info({ lat, lon, date: day }, "Looking up timezone");

    const body = await this.fetchJson(url);
    this.raiseForStatus(body, lat, lon);

    if (body.timezoneId === undefined || body.timezoneId === "") {
      throw new TimezoneNotFoundError(
        `No timezone at (${String(lat)}, ${String(lon)})`
      );
    }

    const entry = body.dates?.find((d) => d.date.startsWith(day)) ?? body.dates?.[0];
    const gmtOffset = entry?.offsetToGmt ?? body.gmtOffset;
    if (gmtOffset === undefined) {
      throw new TransientLookupError(
        `GeoNames returned no offset for ${body.timezoneId} on ${day}`
      );
    }

    apiLogger.debug(
      { lat, lon, date: day, tzid: body.timezoneId, gmtOffset },
      "Timezone resolved"
    );

    return { tzid: body.timezoneId, gmtOffset };
  }

  private async fetchJson(url: string): Promise<GeoNamesResponse> {
    const {
      maxRetries,
      rateLimitMs,
      timeoutMs,
      initialBackoffMs,
      backoffMultiplier,
      maxBackoffMs,
    } = this.options;

    let lastError: ResolutionError | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const backoffMs = Math.min(
          initialBackoffMs * Math.pow(backoffMultiplier, attempt - 1),
          maxBackoffMs
        );
        apiLogger.warn(
          { attempt, backoffMs, error: lastError?.message },
          "Retrying GeoNames request"
        );
        await sleep(backoffMs);
      }

      let response: Response;
      try {
        response = await rateLimitedFetch(url, rateLimitMs, {
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        lastError = new TransientLookupError(
          `GeoNames request failed: ${errorMessage(error)}`
        );
        continue;
      }

      if (RETRY_STATUSES.has(response.status)) {
        lastError = new TransientLookupError(
          `GeoNames responded ${String(response.status)} ${response.statusText}`,
          response.status
        );
        continue;
      }

      if (!response.ok) {
        apiLogger.error(
          { status: response.status, statusText: response.statusText },
          "GeoNames request rejected"
        );
        throw new TransientLookupError(
          `GeoNames responded ${String(response.status)} ${response.statusText}`,
          response.status
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new TransientLookupError(
          `GeoNames returned invalid JSON: ${errorMessage(error)}`,
          response.status
        );
      }

      if (!Value.Check(GeoNamesResponseSchema, body)) {
        const first = Value.Errors(GeoNamesResponseSchema, body).First();
        throw new TransientLookupError(
          `Unexpected GeoNames response${first !== undefined ? ` at ${first.path}: ${first.message}` : ""}`,
          response.status
        );
      }

      return body;
    }

    apiLogger.error(
      { maxRetries, error: lastError?.message },
      "GeoNames retries exhausted"
    );
    throw lastError ?? new TransientLookupError("GeoNames request failed");
  }

  private raiseForStatus(body: GeoNamesResponse, lat: number, lon: number): void {
    const status = body.status;
    if (status === undefined) return;

    const detail = `GeoNames error ${String(status.value)}: ${status.message}`;
    apiLogger.error({ lat, lon, code: status.value, message: status.message }, "GeoNames error");

    if (
      status.value === AUTH_CODE ||
      status.message.startsWith("user account not enabled to use")
    ) {
      throw new LookupAuthError(detail);
    }
    if (QUOTA_CODES.has(status.value)) {
      throw new QuotaExceededError(detail);
    }
    if (status.value === NO_RESULT_CODE) {
      throw new TimezoneNotFoundError(detail);
    }
    throw new TransientLookupError(detail);
  }
}
