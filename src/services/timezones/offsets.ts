import type { CalendarDate } from "../../types/index.js";

const OFFSET_PATTERN = /^GMT(?:([+-])(\d{1,2})(?::(\d{2}))?)?$/;

/**
 * UTC offset in hours of an IANA zone on a date (taken at 12:00 UTC), or
 * null when the runtime does not know the zone.
 */
export function offsetForDate(tzid: string, date: CalendarDate): number | null {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: tzid,
      timeZoneName: "longOffset",
    });
  } catch {
    return null;
  }

  const instant = new Date(Date.UTC(date.year, date.month - 1, date.day, 12));
  const name = formatter
    .formatToParts(instant)
    .find((part) => part.type === "timeZoneName")?.value;
  if (name === undefined) return null;

  const match = OFFSET_PATTERN.exec(name);
  if (match === null) return null;
  if (match[1] === undefined) return 0;

  const hours = Number(match[2]) + Number(match[3] ?? "0") / 60;
  return match[1] === "-" ? -hours : hours;
}
