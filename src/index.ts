export { HashTable, BUCKET_SIZE } from "./hash-table.js";

export {
  type Hashable,
  type KeyHasher,
  type KeyEquals,
  hashKey,
  keysEqual,
  isHashable,
} from "./hash.js";
