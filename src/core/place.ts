import type { Coordinates, Place } from "./types.js";
import { distanceKm } from "./geo.js";

export const NAME_SEPARATOR = ", ";

/** Places with the same name closer than this are the same place. */
export const SAME_PLACE_KM = 1;

export function fullName(place: Place): string {
  return [place.name, place.region, place.country].join(NAME_SEPARATOR);
}

export function distanceFrom(place: Place, origin: Coordinates): number {
  return distanceKm(place, origin);
}

/**
 * Near-equality: identical name parts and less than a kilometre apart.
 * Not transitive, which is fine for dedup within a single key.
 */
export function samePlace(a: Place, b: Place): boolean {
  if (a === b) return true;
  return (
    a.name === b.name &&
    a.region === b.region &&
    a.country === b.country &&
    distanceKm(a, b) < SAME_PLACE_KM
  );
}
