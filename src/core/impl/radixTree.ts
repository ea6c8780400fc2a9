import type { Key } from "../types.js";
import type { PrefixTree, PrefixTreeNodeView, PrefixTreeOptions } from "../prefixTree.js";
import { InvalidKeyError, InvalidValueError } from "../errors.js";
import { commonPrefixLength, normalizeKey, slotIndex } from "../keys.js";

type NodeId = number;

const ROOT: NodeId = 0;
const NONE: NodeId = -1;

type Node<V> = {
  segment: string;
  values: V[];
  parent: NodeId;
  /** slot -> child, allocated with the first child */
  children?: Map<number, NodeId>;
};

function makeNode<V>(segment: string, parent: NodeId): Node<V> {
  return { segment, values: [], parent };
}

/**
 * Arena-backed radix tree.
 *
 * Nodes live in a flat array and refer to each other by index, so split and
 * merge re-parent in O(1) without reference cycles. Freed slots are reused.
 *
 * Structure invariants:
 * - root segment is "" and is never merged or detached
 * - a child's segment is non-empty and its first character picks its slot
 * - outside of a mutation, no non-root node has zero values and fewer than two children
 */
export class RadixTree<V> implements PrefixTree<V> {
  private readonly nodes: Node<V>[] = [makeNode("", NONE)];
  private readonly free: NodeId[] = [];
  private readonly equals: (a: V, b: V) => boolean;
  private valueCount = 0;

  constructor(opts?: PrefixTreeOptions<V>) {
    this.equals = opts?.equals ?? Object.is;
  }

  get size(): number {
    return this.valueCount;
  }

  get nodeCount(): number {
    return this.nodes.length - this.free.length;
  }

  insert(key: Key, value: V): boolean {
    if (value === null || value === undefined) throw new InvalidValueError(key);

    let rest = normalizeKey(key);
    let cur = ROOT;

    for (;;) {
      const segment = this.nodes[cur].segment;

      if (rest === segment) return this.addValue(cur, value);

      if (rest.startsWith(segment)) {
        rest = rest.slice(segment.length);
        cur = this.childOrCreate(cur, rest);
        continue;
      }

      // diverges inside this segment: the shared head becomes a new parent
      cur = this.split(cur, commonPrefixLength(segment, rest));
    }
  }

  prefixQuery(key: Key): V[] {
    const id = this.locate(normalizeKey(key), false);
    if (id === undefined) return [];

    const out: V[] = [];
    this.walk(id, "", (_, values) => {
      for (const v of values) out.push(v);
    });
    return out;
  }

  containsExact(key: Key, value: V): boolean {
    const id = this.locate(normalizeKey(key), true);
    return id !== undefined && this.indexOf(id, value) >= 0;
  }

  remove(key: Key, value: V): boolean {
    const id = this.locate(normalizeKey(key), false);
    if (id === undefined) return false;

    const idx = this.indexOf(id, value);
    if (idx < 0) return false;

    this.nodes[id].values.splice(idx, 1);
    this.valueCount--;
    this.rebalance(id);
    return true;
  }

  clear(): void {
    this.nodes.length = 0;
    this.nodes.push(makeNode("", NONE));
    this.free.length = 0;
    this.valueCount = 0;
  }

  /** Every (reconstructed key, value) pair in iteration order. */
  entries(): Array<[Key, V]> {
    const out: Array<[Key, V]> = [];
    this.walk(ROOT, "", (key, values) => {
      for (const v of values) out.push([key, v]);
    });
    return out;
  }

  structure(): PrefixTreeNodeView<V> {
    return this.view(ROOT);
  }

  /** Snapshot iteration: later mutations do not affect an iterator already handed out. */
  [Symbol.iterator](): Iterator<V> {
    return this.prefixQuery("")[Symbol.iterator]();
  }

  private locate(key: Key, exact: boolean): NodeId | undefined {
    let rest = key;
    let cur = ROOT;

    for (;;) {
      const node = this.nodes[cur];
      const segment = node.segment;

      if (exact ? segment === rest : segment.startsWith(rest)) return cur;
      if (!rest.startsWith(segment)) return undefined;

      rest = rest.slice(segment.length);
      const next = node.children?.get(slotIndex(rest));
      if (next === undefined) return undefined;
      cur = next;
    }
  }

  private walk(from: NodeId, prefix: Key, visit: (key: Key, values: readonly V[]) => void): void {
    const stack: Array<{ id: NodeId; prefix: Key }> = [{ id: from, prefix }];

    for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
      const node = this.nodes[top.id];
      const key = top.prefix + node.segment;
      visit(key, node.values);

      // reverse push so pop() yields ascending slots
      const children = this.childrenInOrder(top.id);
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ id: children[i], prefix: key });
      }
    }
  }

  private view(id: NodeId): PrefixTreeNodeView<V> {
    const node = this.nodes[id];
    return {
      segment: node.segment,
      values: node.values.slice(),
      children: this.childrenInOrder(id).map((c) => this.view(c)),
    };
  }

  private childrenInOrder(id: NodeId): NodeId[] {
    const children = this.nodes[id].children;
    if (!children) return [];
    return Array.from(children.entries())
      .sort((a, b) => a[0] - b[0])
      .map(([, child]) => child);
  }

  private indexOf(id: NodeId, value: V): number {
    return this.nodes[id].values.findIndex((v) => this.equals(v, value));
  }

  private addValue(id: NodeId, value: V): boolean {
    if (this.indexOf(id, value) >= 0) return false;
    this.nodes[id].values.push(value);
    this.valueCount++;
    return true;
  }

  private alloc(segment: string, parent: NodeId): NodeId {
    const reused = this.free.pop();
    if (reused !== undefined) {
      this.nodes[reused] = makeNode(segment, parent);
      return reused;
    }
    this.nodes.push(makeNode(segment, parent));
    return this.nodes.length - 1;
  }

  private release(id: NodeId): void {
    this.nodes[id] = makeNode("", NONE);
    this.free.push(id);
  }

  private setChild(parent: NodeId, child: NodeId): void {
    const node = this.nodes[parent];
    if (!node.children) node.children = new Map();
    node.children.set(slotIndex(this.nodes[child].segment), child);
  }

  private childOrCreate(parent: NodeId, rest: Key): NodeId {
    const existing = this.nodes[parent].children?.get(slotIndex(rest));
    if (existing !== undefined) return existing;

    const child = this.alloc(rest, parent);
    this.setChild(parent, child);
    return child;
  }

  /** Truncates `id`'s segment to `length` chars by inserting a parent that owns the head. */
  private split(id: NodeId, length: number): NodeId {
    const node = this.nodes[id];
    if (length <= 0 || length >= node.segment.length) {
      throw new InvalidKeyError(node.segment, `cannot split segment at ${length}`);
    }

    const head = this.alloc(node.segment.slice(0, length), node.parent);
    node.segment = node.segment.slice(length);
    node.parent = head;

    this.setChild(this.nodes[head].parent, head);
    this.setChild(head, id);
    return head;
  }

  private rebalance(from: NodeId): void {
    let cur = from;

    while (cur !== ROOT) {
      const node = this.nodes[cur];
      if (node.values.length > 0) return;

      const childCount = node.children?.size ?? 0;
      if (childCount > 1) return;

      if (childCount === 1) {
        this.mergeIntoChild(cur);
        return;
      }

      const parent = node.parent;
      this.detach(cur);
      cur = parent;
    }
  }

  /** The only child absorbs `id`'s segment and takes its slot in the grandparent. */
  private mergeIntoChild(id: NodeId): void {
    const node = this.nodes[id];
    for (const childId of node.children?.values() ?? []) {
      const child = this.nodes[childId];
      child.segment = node.segment + child.segment;
      child.parent = node.parent;
      this.setChild(node.parent, childId);
      this.release(id);
      return;
    }
  }

  private detach(id: NodeId): void {
    const node = this.nodes[id];
    const parent = this.nodes[node.parent];
    parent.children?.delete(slotIndex(node.segment));
    if (parent.children?.size === 0) parent.children = undefined;
    this.release(id);
  }
}
