import type { DistanceUnit } from "../types/index.js";

export const MILES_PER_KM = 0.621371;
export const KM_PER_MILE = 1.60934;

const UNIT_ALIASES: Record<string, DistanceUnit> = {
  km: "km",
  kms: "km",
  kilometers: "km",
  kilometres: "km",
  mi: "miles",
  mile: "miles",
  miles: "miles",
};

export function convertDistance(
  value: number,
  from: DistanceUnit,
  to: DistanceUnit
): number {
  if (from === to) return value;
  return from === "km" ? value * MILES_PER_KM : value * KM_PER_MILE;
}

/** Normalize a free-text unit label such as "mi" or "Km"; null if unknown */
export function parseDistanceUnit(text: string): DistanceUnit | null {
  return UNIT_ALIASES[text.trim().toLowerCase()] ?? null;
}
