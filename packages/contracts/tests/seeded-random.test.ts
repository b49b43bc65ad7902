/**
 * Seeded random number generator unit tests
 */

import { describe, expect, it } from "vitest";
import { randomUint32, SeededRandom } from "../src";

describe("SeededRandom (xoshiro128++)", () => {
  it("produces deterministic sequences", () => {
    const rngA = new SeededRandom(123456);
    const seqA = Array.from({ length: 5 }, () => rngA.next());

    const rngB = new SeededRandom(123456);
    const seqB = Array.from({ length: 5 }, () => rngB.next());
    expect(seqB).toEqual(seqA);
  });

  it("diverges for different seeds", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const seqA = Array.from({ length: 4 }, () => a.nextUint32());
    const seqB = Array.from({ length: 4 }, () => b.nextUint32());
    expect(seqA).not.toEqual(seqB);
  });

  it("approximates a uniform distribution (mean/variance sanity)", () => {
    const rng = new SeededRandom(987654321);
    const samples = 20000;

    let sum = 0;
    let sumSquares = 0;
    for (let i = 0; i < samples; i++) {
      const value = rng.next();
      sum += value;
      sumSquares += value * value;
    }

    const mean = sum / samples;
    const variance = sumSquares / samples - mean * mean;

    // For a uniform [0,1), mean ~ 0.5 and variance ~ 1/12
    expect(mean).toBeGreaterThan(0.49);
    expect(mean).toBeLessThan(0.51);
    expect(variance).toBeGreaterThan(0.075);
    expect(variance).toBeLessThan(0.09);
  });

  it("range helper stays within bounds and covers edges", () => {
    const rng = new SeededRandom(42);
    const hits = new Set<number>();

    for (let i = 0; i < 5000; i++) {
      const value = rng.range(1, 3);
      hits.add(value);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(3);
    }

    expect([...hits].sort()).toEqual([1, 2, 3]);
  });

  it("uniform stays in [min, max)", () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng.uniform(0.1, 0.3);
      expect(value).toBeGreaterThanOrEqual(0.1);
      expect(value).toBeLessThan(0.3);
    }
  });

  it("choice returns undefined for empty arrays", () => {
    const rng = new SeededRandom(3);
    expect(rng.choice([])).toBeUndefined();
    expect(rng.choice(["only"])).toBe("only");
  });

  it("shuffle keeps every element", () => {
    const rng = new SeededRandom(99);
    const input = [1, 2, 3, 4, 5, 6];
    const shuffled = rng.shuffle(input);
    expect([...shuffled].sort((a, b) => a - b)).toEqual(input);
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe("randomUint32", () => {
  it("returns an unsigned 32-bit integer", () => {
    const value = randomUint32();
    expect(Number.isInteger(value)).toBe(true);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(0xffffffff);
  });
});
