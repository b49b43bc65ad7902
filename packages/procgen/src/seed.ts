/**
 * Seed Creation Utilities
 */

import { randomUint32, resolveSeed } from "@pushbox/contracts";

/**
 * Validate a numeric seed. Throws a `SEED_INVALID` PuzzleError when the
 * value is not an unsigned 32-bit integer.
 */
export function createSeed(input: number): number {
  return resolveSeed(input).getOrThrow();
}

/**
 * Create a seed from a string, so a level can be shared by name.
 */
export function createSeedFromString(input: string): number {
  // DJB2 hash function for strings
  let hash = 5381;
  for (let i = 0; i < input.length; i++) {
    hash = ((hash << 5) + hash + input.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Create a random seed using system randomness.
 */
export function randomSeed(): number {
  return randomUint32();
}
