import type { Key } from "./types.js";

export interface PrefixTreeOptions<V> {
  /** Value equality used for dedup, lookup and removal. Defaults to `Object.is`. */
  equals?: (a: V, b: V) => boolean;
}

/** Read-only view of one node, children in slot order. */
export interface PrefixTreeNodeView<V> {
  segment: string;
  values: readonly V[];
  children: PrefixTreeNodeView<V>[];
}

/**
 * Compressed prefix tree mapping normalized keys to sets of values.
 *
 * Contract notes:
 * - keys are normalized before every operation (see `normalizeKey`)
 * - several values may share a key; a (key, value) pair is stored once
 * - mutation needs exclusive access; reads may run together
 */
export interface PrefixTree<V> extends Iterable<V> {
  /** Returns false when the pair already exists. */
  insert(key: Key, value: V): boolean;

  /** Every value whose key starts with `key`, depth-first in slot order. */
  prefixQuery(key: Key): V[];

  /** True only when `key` names a node exactly and that node holds `value`. */
  containsExact(key: Key, value: V): boolean;

  remove(key: Key, value: V): boolean;

  clear(): void;

  readonly size: number;
  readonly nodeCount: number;

  structure(): PrefixTreeNodeView<V>;
}
