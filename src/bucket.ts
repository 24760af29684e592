import type { KeyEquals } from "./hash.js";

export interface ChainNode<K, V> {
  key: K;
  value: V;
  next?: ChainNode<K, V>;
}

/**
 * A singly-linked chain of entries whose keys share a bucket index.
 * Keys within one chain are always pairwise distinct.
 */
export class Bucket<K, V> {
  head?: ChainNode<K, V>;
  len: number;
  readonly eq: KeyEquals<K>;

  constructor(eq: KeyEquals<K>) {
    this.eq = eq;
    this.len = 0;
  }

  /**
   * Overwrite the value of an existing entry in place, or prepend a new one.
   */
  insert(key: K, value: V) {
    for (let node = this.head; node; node = node.next) {
      if (this.eq(node.key, key)) {
        node.value = value;
        return;
      }
    }

    this.head = { key, value, next: this.head };
    this.len++;
  }

  remove(key: K) {
    let prev: ChainNode<K, V> | undefined;

    for (let node = this.head; node; node = node.next) {
      if (this.eq(node.key, key)) {
        // splice the successor into whatever pointed at this node
        if (prev) {
          prev.next = node.next;
        } else {
          this.head = node.next;
        }
        this.len--;
        return;
      }
      prev = node;
    }
  }

  get(key: K): V | undefined {
    for (let node = this.head; node; node = node.next) {
      if (this.eq(node.key, key)) return node.value;
    }
  }
}
