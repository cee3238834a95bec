/* ── arena node: index of the predecessor, never a nested object ── */
interface Node<T> {
  data: T;
  prev: number | undefined;
}

/** Handle onto one stored element; replacing `value` keeps the links. */
export interface ChainSlot<T> {
  value: T;
}

/**
 * Append-only singly-linked sequence, walked newest to oldest.
 * Nodes live in a flat arena so traversal never recurses.
 */
export class Chain<T> {
  private nodes: Node<T>[] = [];
  private headIdx: number | undefined = undefined;
  private len = 0;

  append(item: T): void {
    this.nodes.push({ data: item, prev: this.headIdx });
    this.headIdx = this.nodes.length - 1;
    this.len += 1;
  }

  head(): T | undefined {
    return this.headIdx === undefined ? undefined : this.nodes[this.headIdx].data;
  }

  get length(): number {
    return this.len;
  }

  *iter(): IterableIterator<T> {
    for (const node of this.walk()) yield node.data;
  }

  *iterMut(): IterableIterator<ChainSlot<T>> {
    for (const node of this.walk()) {
      yield {
        get value() {
          return node.data;
        },
        set value(v: T) {
          node.data = v;
        },
      };
    }
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.iter();
  }

  private *walk(): IterableIterator<Node<T>> {
    let idx = this.headIdx;
    while (idx !== undefined) {
      const node = this.nodes[idx];
      yield node;
      idx = node.prev;
    }
  }
}
