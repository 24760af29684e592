/**
 * Objects that can be used as keys by value rather than by identity.
 */
export interface Hashable {
  /** Must stay the same for as long as the object is used as a key. */
  readonly hashCode: number;
  equals(other: unknown): boolean;
}

export type KeyHasher<K> = (key: K) => number;

export type KeyEquals<K> = (a: K, b: K) => boolean;

const TRUE_HASH = 1231;
const FALSE_HASH = 1237;

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

export function isHashable(v: unknown): v is Hashable {
  return (
    typeof v === "object" &&
    v !== null &&
    "hashCode" in v &&
    "equals" in v &&
    typeof v.equals === "function"
  );
}

function hashString(str: string) {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function hashInteger(n: number) {
  let h = n | 0;
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
  h = (h >>> 16) ^ h;
  return h >>> 0;
}

function hashIdentity(obj: object) {
  let id = identities.get(obj);
  if (id === undefined) {
    id = nextIdentity++;
    identities.set(obj, id);
  }
  return hashInteger(id);
}

/**
 * Default key hasher.
 *
 * Strings and bigints go through FNV-1a, integers through a bit mixer and
 * other numbers through their string form, so `-0` and `0` collide and every
 * `NaN` hashes alike. {@link Hashable} objects supply their own hash; any
 * other object or function is hashed by identity.
 *
 * @param key - Key to hash.
 * @returns An unsigned 32-bit integer.
 */
export function hashKey(key: unknown): number {
  switch (typeof key) {
    case "string":
      return hashString(key);
    case "number":
      return Number.isInteger(key) ? hashInteger(key) : hashString(String(key));
    case "boolean":
      return key ? TRUE_HASH : FALSE_HASH;
    case "bigint":
      return hashString(key.toString());
    case "object":
    case "function":
      if (key === null) return hashString("null");
      if (isHashable(key)) return key.hashCode >>> 0;
      return hashIdentity(key);
    default:
      // undefined and symbols
      return hashString(String(key));
  }
}

/**
 * Default key equality: SameValueZero for primitives, `equals` for two
 * {@link Hashable} objects, identity for everything else.
 */
export function keysEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (isHashable(a) && isHashable(b)) return a.equals(b);
  return false;
}
