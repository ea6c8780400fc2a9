import type { Coordinates, Place, Suggestion } from "./types.js";

export interface RankOptions {
  /** Items scoring below this are dropped. */
  minScore?: number;
}

/**
 * Turns an unordered match set into display-ready suggestions.
 *
 * Both modes filter, sort descending by score (stable) and floor scores to one decimal.
 */
export interface Ranker {
  /** Score by population relative to the whole match set. */
  rankByPopularity(matches: readonly Place[], options?: RankOptions): Suggestion[];

  /** Score decays with distance from the origin, slower for larger populations. */
  rankByDistance(matches: readonly Place[], latitude: number, longitude: number, options?: RankOptions): Suggestion[];

  /** Distance mode when `origin` is given, popularity mode otherwise. */
  rank(matches: readonly Place[], origin?: Coordinates, options?: RankOptions): Suggestion[];
}
