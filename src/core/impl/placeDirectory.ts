import type { Coordinates, Place, QueryResponse } from "../types.js";
import type { PrefixTree } from "../prefixTree.js";
import type { Ranker } from "../ranker.js";
import { fullName } from "../place.js";

export interface QueryOptions {
  /** rank by distance from here; popularity only when absent */
  origin?: Coordinates;
  /** cap on returned suggestions, applied after ranking */
  limit?: number;
}

export interface DirectoryDeps {
  tree: PrefixTree<Place>;
  ranker: Ranker;
}

/**
 * Places indexed by display name.
 *
 * Owns its tree; every method is synchronous, so a call never interleaves
 * with another on the event loop and writers get exclusive access for free.
 */
export class PlaceDirectory {
  constructor(private readonly deps: DirectoryDeps) {}

  get size(): number {
    return this.deps.tree.size;
  }

  add(place: Place): boolean {
    return this.deps.tree.insert(fullName(place), place);
  }

  /** Returns how many places were new. */
  addMany(places: Iterable<Place>): number {
    let added = 0;
    for (const p of places) {
      if (this.add(p)) added++;
    }
    return added;
  }

  remove(place: Place): boolean {
    return this.deps.tree.remove(fullName(place), place);
  }

  has(place: Place): boolean {
    return this.deps.tree.containsExact(fullName(place), place);
  }

  getAll(term: string): Place[] {
    return this.deps.tree.prefixQuery(term);
  }

  query(term: string, options?: QueryOptions): QueryResponse {
    const suggestions = this.deps.ranker.rank(this.getAll(term), options?.origin);
    const limit = options?.limit;
    return { suggestions: limit !== undefined ? suggestions.slice(0, limit) : suggestions };
  }

  reset(): void {
    this.deps.tree.clear();
  }
}
