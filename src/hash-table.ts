import { Bucket } from "./bucket.js";
import { type KeyEquals, type KeyHasher, hashKey, keysEqual } from "./hash.js";

/**
 * Number of buckets in every table. Tables never grow, so lookups degrade
 * linearly once there are many more keys than buckets.
 */
export const BUCKET_SIZE = 8;

/**
 * Separate-chaining hash table with a fixed number of buckets.
 */
export class HashTable<K, V> {
  private readonly hasher: KeyHasher<K>;
  private readonly eq: KeyEquals<K>;
  private readonly buckets: readonly Bucket<K, V>[];

  /**
   * @param hasher - Hash function for keys. Any finite number is accepted;
   * it is reduced to a bucket index internally.
   * @param eq - Test if two keys are equal. Keys that are equal must hash
   * to the same value.
   */
  constructor(
    hasher: KeyHasher<K> = hashKey,
    eq: KeyEquals<K> = keysEqual
  ) {
    this.hasher = hasher;
    this.eq = eq;
    this.buckets = Array.from(
      { length: BUCKET_SIZE },
      () => new Bucket<K, V>(this.eq)
    );
  }

  /**
   * @returns The number of entries across all buckets.
   */
  len() {
    return this.buckets.reduce((total, bucket) => total + bucket.len, 0);
  }

  /**
   * Insert an entry, replacing the value if the key is already present.
   */
  insert(k: K, v: V) {
    this.buckets[this.hash(k)].insert(k, v);
  }

  /**
   * Remove the entry for a key. Does nothing if the key is absent.
   */
  remove(k: K) {
    this.buckets[this.hash(k)].remove(k);
  }

  get(k: K) {
    return this.buckets[this.hash(k)].get(k);
  }

  private hash(k: K) {
    const h = Math.trunc(this.hasher(k));
    if (!Number.isFinite(h)) return 0;
    return ((h % BUCKET_SIZE) + BUCKET_SIZE) % BUCKET_SIZE;
  }
}
