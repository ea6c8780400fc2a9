/** Shared core types used by module contracts. */

export type Key = string;

/** A named geographic point indexed by its display name. */
export interface Place {
  name: string;
  /** Province or state, already expanded to its postal abbreviation. */
  region: string;
  country: string;
  latitude: number;
  longitude: number;
  population: number;
}

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** A ranked, display-ready match. */
export interface Suggestion {
  name: string;
  /** Formatted with at most 5 decimals. */
  latitude: string;
  longitude: string;
  score: number;
}

export interface QueryResponse {
  suggestions: Suggestion[];
}
