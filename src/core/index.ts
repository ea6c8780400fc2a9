export * from "./types.js";
export * from "./errors.js";
export * from "./keys.js";
export * from "./geo.js";
export * from "./place.js";
export type { PrefixTree, PrefixTreeNodeView, PrefixTreeOptions } from "./prefixTree.js";
export type { Ranker, RankOptions } from "./ranker.js";
export * from "./impl/index.js";
