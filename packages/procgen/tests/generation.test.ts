/**
 * High-level generation API tests
 */

import { type GenerationConfigInput, PuzzleError } from "@pushbox/contracts";
import { describe, expect, it } from "vitest";
import {
  assertDeterministic,
  createSeed,
  createSeedFromString,
  deriveAttemptSeeds,
  FALLBACK_LEVELS,
  generateLevel,
  isValidLevel,
  levelState,
  solveLevel,
  solvesFrom,
  stateKey,
} from "../src";

const SMALL: GenerationConfigInput = {
  rows: [7, 8],
  cols: [7, 8],
  boxes: [1, 2],
  complexity: [0, 0.2],
  steps: [10, 20],
  minSteps: 5,
};

/** Eight boxes in a 3x3 room leave the player nowhere to pull from */
const STUCK: GenerationConfigInput = {
  rows: [5, 5],
  cols: [5, 5],
  boxes: [8, 8],
  complexity: [0, 0],
  steps: [1, 1],
  minSteps: 1,
  maxAttempts: 3,
};

function thrownCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return PuzzleError.isPuzzleError(error) ? error.code : "not a PuzzleError";
  }
  return undefined;
}

describe("createSeed", () => {
  it("accepts unsigned 32-bit integers", () => {
    expect(createSeed(12345)).toBe(12345);
    expect(createSeed(0xffffffff)).toBe(0xffffffff);
  });

  it("rejects anything else", () => {
    expect(thrownCode(() => createSeed(-1))).toBe("SEED_INVALID");
    expect(thrownCode(() => createSeed(1.5))).toBe("SEED_INVALID");
    expect(thrownCode(() => createSeed(2 ** 32))).toBe("SEED_INVALID");
  });
});

describe("createSeedFromString", () => {
  it("hashes strings deterministically", () => {
    expect(createSeedFromString("")).toBe(5381);
    expect(createSeedFromString("a")).toBe(177670);
    expect(createSeedFromString("daily")).toBe(createSeedFromString("daily"));
    expect(createSeedFromString("daily")).not.toBe(createSeedFromString("weekly"));
  });
});

describe("deriveAttemptSeeds", () => {
  it("is a pure function of seed and attempt", () => {
    expect(deriveAttemptSeeds(42, 3)).toEqual(deriveAttemptSeeds(42, 3));
  });

  it("gives each attempt its own seeds", () => {
    const first = deriveAttemptSeeds(42, 0);
    const second = deriveAttemptSeeds(42, 1);
    expect(first.layout).not.toBe(second.layout);
    expect(first.layout).not.toBe(first.play);
  });
});

describe("generateLevel", () => {
  it("returns levels its solution and playback both solve", () => {
    const sources = new Set<string>();
    for (let seed = 1; seed <= 5; seed++) {
      const level = generateLevel(SMALL, { seed });
      sources.add(level.source);

      expect(level.seed).toBe(seed);
      expect(solvesFrom(level.state, level.solution)).toBe(true);
      expect(solvesFrom(level.state, level.playback)).toBe(true);
      expect(level.solution.length).toBeLessThanOrEqual(level.playback.length);
      expect(isValidLevel(level.state)).toBe(true);
    }
    expect(sources.has("generated")).toBe(true);
  });

  it("round-trips the level text", () => {
    const level = generateLevel(SMALL, { seed: 7 });
    expect(stateKey(levelState(level.text))).toBe(stateKey(level.state));
  });

  it("returns the solver's shortest solution for generated levels", () => {
    for (let seed = 1; seed <= 5; seed++) {
      const level = generateLevel(SMALL, { seed });
      if (level.source !== "generated") continue;
      const result = solveLevel(level.text).getOrThrow();
      expect(result.found).toBe(true);
      if (result.found) expect(result.moves).toEqual(level.solution);
    }
  });

  it("is deterministic for numeric and string seeds", () => {
    expect(() => assertDeterministic(SMALL, 42)).not.toThrow();
    expect(() => assertDeterministic(SMALL, "daily-42")).not.toThrow();
  });

  it("hashes string seeds", () => {
    const level = generateLevel(SMALL, { seed: "daily" });
    expect(level.seed).toBe(createSeedFromString("daily"));
  });

  it("picks a random seed when none is given", () => {
    const level = generateLevel(SMALL);
    expect(Number.isInteger(level.seed)).toBe(true);
    expect(level.seed).toBeGreaterThanOrEqual(0);
  });

  it("records an entry per attempt", () => {
    const level = generateLevel(SMALL, { seed: 11 });
    level.attempts.forEach((record, index) => {
      expect(record.attempt).toBe(index);
      expect(record.seeds).toEqual(deriveAttemptSeeds(11, index));
    });
    if (level.source === "generated") {
      expect(level.attempts[level.attempts.length - 1].outcome).toBe("generated");
    }
  });

  it("throws on an invalid config", () => {
    expect(thrownCode(() => generateLevel({ rows: [3, 3] }))).toBe("CONFIG_INVALID");
    expect(thrownCode(() => generateLevel({ boxes: [3, 1] }))).toBe("CONFIG_INVALID");
  });

  it("throws on an invalid seed", () => {
    expect(thrownCode(() => generateLevel(SMALL, { seed: -5 }))).toBe("SEED_INVALID");
  });

  it("only collects trace events when asked", () => {
    expect(generateLevel(SMALL, { seed: 1 }).events).toEqual([]);

    const traced = generateLevel(SMALL, { seed: 1, trace: true });
    const stages = new Set(traced.events.map((event) => event.stage));
    expect(stages.has("layout")).toBe(true);
    expect(stages.has("reverse-play")).toBe(true);
  });
});

describe("generateLevel fallback", () => {
  it("falls back to the bank once every attempt fails", () => {
    const level = generateLevel(STUCK, { seed: 5 });

    expect(level.source).toBe("fallback");
    expect(level.attempts.map((record) => record.outcome)).toEqual([
      "too-trivial",
      "too-trivial",
      "too-trivial",
    ]);
    expect(level.fallbackIndex).not.toBeNull();
    const banked = FALLBACK_LEVELS[level.fallbackIndex ?? -1];
    expect(stateKey(level.state)).toBe(stateKey(levelState(banked.text)));
    expect(solvesFrom(level.state, level.solution)).toBe(true);
  });

  it("does not repeat the previous fallback", () => {
    const first = generateLevel(STUCK, { seed: 5 });
    const second = generateLevel(STUCK, {
      seed: 5,
      previousFallback: first.fallbackIndex,
    });
    expect(second.source).toBe("fallback");
    expect(second.fallbackIndex).not.toBe(first.fallbackIndex);
  });

  it("traces the fallback decision", () => {
    const level = generateLevel(STUCK, { seed: 5, trace: true });
    const decisions = level.events.filter(
      (event) => event.stage === "fallback" && event.eventType === "decision",
    );
    expect(decisions).toHaveLength(1);
  });
});
