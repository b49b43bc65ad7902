/**
 * Random helpers over any `() => number` source in [0, 1).
 */

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: () => number, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Random float in [min, max)
 */
export function uniform(rng: () => number, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * Random element, or undefined for an empty array
 */
export function choice<T>(rng: () => number, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined;
export function choice<T>(rng: () => number, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  const index = range(rng, 0, array.length - 1);
  return array[index];
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(rng: () => number, array: readonly T[]): T[] {
  const result: T[] = Array.from(array);
  for (let i = result.length - 1; i > 0; i--) {
    const j = range(rng, 0, i);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
