// src/utils/id.ts
import { monotonicFactory } from "ulid";

// rows created within the same millisecond still sort in creation order
const nextUlid = monotonicFactory();

/** Primary key for every table: a 26-character ULID. */
export function newId() {
  return nextUlid();
}

/** The last `len` characters of a fresh ULID: upper-case Crockford base32. */
export function randomSuffix(len = 6) {
  return nextUlid().slice(-len);
}
