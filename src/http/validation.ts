import type { Place } from "../core/types.js";
import { isValidCoordinates } from "../core/geo.js";
import type { FieldError } from "./problem.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

/** Query-string number; "" and garbage are undefined. */
export function parseNumberParam(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

export function parseIntParam(raw: string): number | undefined {
  const n = parseNumberParam(raw);
  return n !== undefined && Number.isInteger(n) ? n : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}

/**
 * Validates one place from a request body. Field errors are reported under `path`.
 */
export function asPlace(v: unknown, path: string, errors: FieldError[]): Place | undefined {
  if (!isRecord(v)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }

  const before = errors.length;
  const name = asString(v.name);
  const region = asString(v.region);
  const country = asString(v.country);
  const latitude = asNumber(v.latitude);
  const longitude = asNumber(v.longitude);
  const population = asNumber(v.population);

  if (!name || !name.trim()) pushErr(errors, `${path}.name`, "must be non-empty");
  if (region === undefined) pushErr(errors, `${path}.region`, "must be a string");
  if (country === undefined) pushErr(errors, `${path}.country`, "must be a string");
  if (latitude === undefined) pushErr(errors, `${path}.latitude`, "must be a number");
  if (longitude === undefined) pushErr(errors, `${path}.longitude`, "must be a number");
  if (latitude !== undefined && longitude !== undefined && !isValidCoordinates({ latitude, longitude })) {
    pushErr(errors, path, "latitude must be within ±90 and longitude within ±180");
  }
  if (population === undefined || population <= 0) pushErr(errors, `${path}.population`, "must be a positive number");

  if (
    errors.length > before ||
    name === undefined ||
    region === undefined ||
    country === undefined ||
    latitude === undefined ||
    longitude === undefined ||
    population === undefined
  ) {
    return undefined;
  }

  return { name, region, country, latitude, longitude, population };
}
