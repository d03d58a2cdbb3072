/** Mean Earth radius in kilometers */
export const EARTH_RADIUS_KM = 6371;

export interface Coordinate {
  lat: number;
  lon: number;
}

/**
 * Great-circle distance between two coordinates using the Haversine formula.
 *
 * @returns Distance in kilometers
 */
export function haversineDistance(a: Coordinate, b: Coordinate): number {
  const lat1 = (a.lat * Math.PI) / 180;
  const lat2 = (b.lat * Math.PI) / 180;
  const dLat = ((b.lat - a.lat) * Math.PI) / 180;
  const dLon = ((b.lon - a.lon) * Math.PI) / 180;

  const sinDLat = Math.sin(dLat / 2);
  const sinDLon = Math.sin(dLon / 2);

  const h =
    sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLon * sinDLon;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, h)));
}
