import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { makeDate } from "../../../src/codec/temporal.js";
import {
  LookupAuthError,
  QuotaExceededError,
  TimezoneNotFoundError,
  TransientLookupError,
} from "../../../src/errors.js";
import { GeoNamesClient } from "../../../src/scraper/geonames.js";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("scraper/geonames", () => {
  const fetchMock = vi.fn<(url: string, init?: RequestInit) => Promise<Response>>();
  const date = makeDate(2023, 3, 14);

  function client(): GeoNamesClient {
    return new GeoNamesClient({
      username: "test-user",
      rateLimitMs: 0,
      initialBackoffMs: 0,
      maxRetries: 2,
    });
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should query by coordinates, date and username", async () => {
    fetchMock.mockResolvedValueOnce(
      json({ timezoneId: "Europe/London", gmtOffset: 0, dates: [] })
    );

    await client().lookup(51.47, -0.45, date);

    const url = new URL(fetchMock.mock.calls[0]?.[0] ?? "");
    expect(url.origin + url.pathname).toBe("https://secure.geonames.org/timezoneJSON");
    expect(Object.fromEntries(url.searchParams)).toEqual({
      lat: "51.47",
      lng: "-0.45",
      date: "2023-03-14",
      username: "test-user",
    });
  });

  it("should take the offset of the queried date", async () => {
    fetchMock.mockResolvedValueOnce(
      json({
        timezoneId: "America/New_York",
        gmtOffset: -5,
        dates: [{ date: "2023-03-14", offsetToGmt: -4 }],
      })
    );

    await expect(client().lookup(40.64, -73.78, date)).resolves.toEqual({
      tzid: "America/New_York",
      gmtOffset: -4,
    });
  });

  it("should fall back to the standard offset without dates", async () => {
    fetchMock.mockResolvedValueOnce(json({ timezoneId: "Asia/Tokyo", gmtOffset: 9 }));

    await expect(client().lookup(35.55, 139.78, date)).resolves.toEqual({
      tzid: "Asia/Tokyo",
      gmtOffset: 9,
    });
  });

  describe("service errors", () => {
    it.each([
      [18, "daily limit of credits exceeded", QuotaExceededError],
      [19, "hourly limit of credits exceeded", QuotaExceededError],
      [10, "user does not exist", LookupAuthError],
      [15, "no result found", TimezoneNotFoundError],
      [22, "server overloaded", TransientLookupError],
    ])("should map code %i to the matching error", async (value, message, type) => {
      fetchMock.mockResolvedValueOnce(json({ status: { value, message } }));

      await expect(client().lookup(0, 0, date)).rejects.toBeInstanceOf(type);
    });

    it("should treat a disabled account as an auth error", async () => {
      fetchMock.mockResolvedValueOnce(
        json({
          status: {
            value: 0,
            message: "user account not enabled to use the free webservice",
          },
        })
      );

      await expect(client().lookup(0, 0, date)).rejects.toBeInstanceOf(LookupAuthError);
    });

    it("should report a response without a timezone as not found", async () => {
      fetchMock.mockResolvedValueOnce(json({ gmtOffset: 0 }));

      await expect(client().lookup(0, 0, date)).rejects.toBeInstanceOf(
        TimezoneNotFoundError
      );
    });
  });

  describe("retries", () => {
    it("should retry 503 responses and network failures", async () => {
      fetchMock
        .mockResolvedValueOnce(new Response("busy", { status: 503 }))
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(json({ timezoneId: "UTC", gmtOffset: 0 }));

      await expect(client().lookup(0, 0, date)).resolves.toEqual({
        tzid: "UTC",
        gmtOffset: 0,
      });
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("should give up after the configured retries", async () => {
      fetchMock.mockImplementation(() =>
        Promise.resolve(new Response("busy", { status: 503 }))
      );

      await expect(client().lookup(0, 0, date)).rejects.toThrow(
        "GeoNames responded 503"
      );
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("should not retry other HTTP errors", async () => {
      fetchMock.mockResolvedValueOnce(new Response("nope", { status: 404 }));

      await expect(client().lookup(0, 0, date)).rejects.toMatchObject({
        status: 404,
      });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
