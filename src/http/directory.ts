import { PlaceDirectory, PlaceRanker, RadixTree } from "../core/impl/index.js";
import { samePlace } from "../core/place.js";
import type { Coordinates, Place, QueryResponse } from "../core/types.js";

export interface SuggestQuery {
  q: string;
  origin?: Coordinates;
  limit?: number;
}

/** What the HTTP layer needs from the place index. */
export interface Directory {
  add(place: Place): boolean;
  remove(place: Place): boolean;
  addMany(places: Place[]): number;
  suggest(query: SuggestQuery): QueryResponse;
  readonly size: number;
}

/**
 * One tree, one ranker. Places that are the same city within a kilometre are
 * stored once.
 */
export function createPlaceDirectory(): PlaceDirectory {
  return new PlaceDirectory({
    tree: new RadixTree<Place>({ equals: samePlace }),
    ranker: new PlaceRanker(),
  });
}

export function createInMemoryDirectory(initial: Place[] = []): Directory {
  const directory = createPlaceDirectory();
  directory.addMany(initial);

  return {
    add(place) {
      return directory.add(place);
    },
    remove(place) {
      return directory.remove(place);
    },
    addMany(places) {
      return directory.addMany(places);
    },
    suggest(query) {
      return directory.query(query.q, { origin: query.origin, limit: query.limit });
    },
    get size() {
      return directory.size;
    },
  };
}
