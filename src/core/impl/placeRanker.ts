import type { Coordinates, Place, Suggestion } from "../types.js";
import type { RankOptions, Ranker } from "../ranker.js";
import { InvalidPopulationError } from "../errors.js";
import { formatCoordinate } from "../geo.js";
import { distanceFrom, fullName } from "../place.js";

export const MIN_SCORE = 0.1;

/** Population magnitude that scores zero in popularity mode. */
const POPULATION_FLOOR_LOG = 3;

/** Distance (km per unit of log10 population) at which the score halves. */
const HALF_LIFE_KM = 100;

// keeps floor(0.7 * 10) from landing on 6
const FLOOR_EPSILON = 1e-9;

type Scored = { place: Place; score: number };

function checkPopulation(place: Place): number {
  const p = place.population;
  if (!Number.isFinite(p) || p <= 0) throw new InvalidPopulationError(fullName(place), p);
  return p;
}

export function floorToTenth(score: number): number {
  return Math.floor(score * 10 + FLOOR_EPSILON) / 10;
}

/**
 * (log10(p) - 3) / (log10(total) - 3).
 * When the total is 1000 or less the log ratio is undefined; fall back to the linear share.
 */
export function popularityScore(population: number, total: number): number {
  const denominator = Math.log10(total) - POPULATION_FLOOR_LOG;
  if (denominator <= 0) return population / total;
  return (Math.log10(population) - POPULATION_FLOOR_LOG) / denominator;
}

/**
 * exp(scale * d), scale = ln(0.5) / (100 * log10(p)).
 * A population of 1 has no decay scale: it scores 1 on the spot and 0 anywhere else.
 */
export function distanceScore(distanceKm: number, population: number): number {
  if (distanceKm === 0) return 1;
  const logPop = Math.log10(population);
  if (logPop <= 0) return 0;
  const scale = Math.log(0.5) / (HALF_LIFE_KM * logPop);
  return Math.exp(scale * distanceKm);
}

export class PlaceRanker implements Ranker {
  rankByPopularity(matches: readonly Place[], options?: RankOptions): Suggestion[] {
    if (matches.length === 0) return [];

    let total = 0;
    for (const m of matches) total += checkPopulation(m);

    const scored = matches.map((place) => ({ place, score: popularityScore(place.population, total) }));
    return this.finish(scored, options);
  }

  rankByDistance(matches: readonly Place[], latitude: number, longitude: number, options?: RankOptions): Suggestion[] {
    if (matches.length === 0) return [];

    const origin: Coordinates = { latitude, longitude };
    const scored = matches.map((place) => ({
      place,
      score: distanceScore(distanceFrom(place, origin), checkPopulation(place)),
    }));
    return this.finish(scored, options);
  }

  rank(matches: readonly Place[], origin?: Coordinates, options?: RankOptions): Suggestion[] {
    return origin
      ? this.rankByDistance(matches, origin.latitude, origin.longitude, options)
      : this.rankByPopularity(matches, options);
  }

  private finish(scored: Scored[], options?: RankOptions): Suggestion[] {
    const minScore = options?.minScore ?? MIN_SCORE;

    // Array.prototype.sort is stable: equal scores keep match order
    return scored
      .filter((s) => s.score >= minScore)
      .sort((a, b) => b.score - a.score)
      .map(({ place, score }) => ({
        name: fullName(place),
        latitude: formatCoordinate(place.latitude),
        longitude: formatCoordinate(place.longitude),
        score: floorToTenth(score),
      }));
  }
}
