import { readFile } from "node:fs/promises";

import type { Place } from "../core/types.js";
import { InvalidRecordError } from "../core/errors.js";
import { isValidCoordinates } from "../core/geo.js";

export const REQUIRED_COLUMNS = ["ascii", "admin1", "country", "lat", "long", "population"] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

/** Numeric Canadian province codes to postal abbreviations. 6 is unassigned. */
const PROVINCE_CODES: Record<number, string> = {
  1: "AB",
  2: "BC",
  3: "MB",
  4: "NB",
  5: "NL",
  7: "NS",
  8: "ON",
  9: "PE",
  10: "QC",
  11: "SK",
  12: "YT",
  13: "NT",
  14: "NU",
};

const COUNTRY_CODES: Record<string, string> = {
  US: "USA",
  CA: "Canada",
};

export interface RecordFailure {
  /** 1-based, header is line 1 */
  line: number;
  message: string;
}

export interface ParsedRecords {
  places: Place[];
  failures: RecordFailure[];
}

export function expandRegion(region: string): string {
  if (!/^\d+$/.test(region)) return region;
  return PROVINCE_CODES[Number(region)] ?? region;
}

export function expandCountry(country: string): string {
  return COUNTRY_CODES[country] ?? country;
}

function parseNumber(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * Parses tab-separated place records. The first line is the header; extra
 * columns are ignored and there is no quoting.
 *
 * Rows that cannot become a place are reported, not thrown; a header missing
 * a required column throws.
 */
export function parsePlaceRecords(text: string): ParsedRecords {
  const lines = text.split(/\r?\n/);
  const header = (lines[0] ?? "").split("\t").map((h) => h.trim());

  const columnAt = (col: Column): number => {
    const i = header.indexOf(col);
    if (i < 0) throw new InvalidRecordError(`missing column "${col}"`, { header });
    return i;
  };
  const index: Record<Column, number> = {
    ascii: columnAt("ascii"),
    admin1: columnAt("admin1"),
    country: columnAt("country"),
    lat: columnAt("lat"),
    long: columnAt("long"),
    population: columnAt("population"),
  };

  const places: Place[] = [];
  const failures: RecordFailure[] = [];

  for (let n = 1; n < lines.length; n++) {
    const line = lines[n];
    if (line.trim() === "") continue;

    const cells = line.split("\t");
    const cell = (col: Column): string => cells[index[col]] ?? "";
    const fail = (message: string): void => {
      failures.push({ line: n + 1, message });
    };

    const name = cell("ascii").trim();
    if (!name) {
      fail("ascii name is empty");
      continue;
    }

    const latitude = parseNumber(cell("lat"));
    const longitude = parseNumber(cell("long"));
    if (latitude === undefined || longitude === undefined) {
      fail("lat/long must be numbers");
      continue;
    }
    if (!isValidCoordinates({ latitude, longitude })) {
      fail("lat/long out of range");
      continue;
    }

    const population = parseNumber(cell("population"));
    if (population === undefined || population <= 0) {
      fail("population must be a positive number");
      continue;
    }

    places.push({
      name,
      region: expandRegion(cell("admin1").trim()),
      country: expandCountry(cell("country").trim()),
      latitude,
      longitude,
      population,
    });
  }

  return { places, failures };
}

export async function loadPlacesFromFile(path: string): Promise<ParsedRecords> {
  const text = await readFile(path, "utf8");
  return parsePlaceRecords(text);
}
