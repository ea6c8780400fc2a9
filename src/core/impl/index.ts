export { RadixTree } from "./radixTree.js";
export { PlaceRanker, MIN_SCORE, distanceScore, floorToTenth, popularityScore } from "./placeRanker.js";
export { PlaceDirectory, type DirectoryDeps, type QueryOptions } from "./placeDirectory.js";
