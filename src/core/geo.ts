import type { Coordinates } from "./types.js";

export const EARTH_RADIUS_KM = 6371;

function toRad(deg: number): number {
  return deg * (Math.PI / 180);
}

function haversine(rad: number): number {
  const s = Math.sin(rad / 2);
  return s * s;
}

/** Great-circle distance in km (haversine formula). */
export function distanceKm(a: Coordinates, b: Coordinates): number {
  const lat1 = toRad(a.latitude);
  const lat2 = toRad(b.latitude);
  const h = haversine(lat2 - lat1) + Math.cos(lat1) * Math.cos(lat2) * haversine(toRad(b.longitude - a.longitude));
  // clamp: rounding can push h slightly above 1 for antipodal points
  return EARTH_RADIUS_KM * 2 * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** At most 5 decimals, trailing zeros dropped: 43.70011, 43.7, -79. */
export function formatCoordinate(deg: number): string {
  const rounded = Number(deg.toFixed(5));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

export function isValidCoordinates(c: Coordinates): boolean {
  return (
    Number.isFinite(c.latitude) &&
    Number.isFinite(c.longitude) &&
    Math.abs(c.latitude) <= 90 &&
    Math.abs(c.longitude) <= 180
  );
}
