/**
 * Fallback bank unit tests
 */

import { SeededRandom } from "@pushbox/contracts";
import { describe, expect, it } from "vitest";
import {
  EMERGENCY_LEVEL,
  FALLBACK_LEVELS,
  type FallbackLevel,
  selectFallback,
  verifyFallback,
} from "../src/fallback";
import { DefaultTraceCollector } from "../src/pipeline";
import { solve } from "../src/solver";
import { levelState, solvesFrom } from "../src/testing";
import { isValidLevel } from "../src/validation";

const GOOD: FallbackLevel = {
  name: "good",
  text: "#####\n#@  #\n# $.#\n#   #\n#####",
  solution: ["D", "R"],
};

const WRONG_SOLUTION: FallbackLevel = { ...GOOD, name: "wrong-solution", solution: ["U"] };

const UNSOLVABLE: FallbackLevel = {
  name: "unsolvable",
  text: "#####\n##$##\n##$##\n#@..#\n#####",
  solution: ["R"],
};

describe("fallback bank", () => {
  it("holds only solvable, valid levels whose known solutions work", () => {
    for (const level of FALLBACK_LEVELS) {
      const state = levelState(level.text);
      expect(solve(state).found, level.name).toBe(true);
      expect(solvesFrom(state, level.solution), level.name).toBe(true);
      expect(isValidLevel(state), level.name).toBe(true);
      expect(verifyFallback(level).isOk(), level.name).toBe(true);
    }
  });

  it("has a working emergency level", () => {
    expect(solvesFrom(levelState(EMERGENCY_LEVEL.text), EMERGENCY_LEVEL.solution)).toBe(true);
  });
});

describe("verifyFallback", () => {
  it("rejects a level whose known solution does not solve it", () => {
    const result = verifyFallback(WRONG_SOLUTION);
    expect(result.isErr()).toBe(true);
    expect(result.error.code).toBe("FALLBACK_CORRUPT");
    expect(result.error.details).toEqual({ blockedAt: 0 });
  });

  it("rejects an unsolvable level", () => {
    const result = verifyFallback(UNSOLVABLE);
    expect(result.error.code).toBe("FALLBACK_CORRUPT");
    expect(result.error.details).toEqual({ reason: "exhausted" });
  });

  it("rejects unparseable text", () => {
    const result = verifyFallback({ ...GOOD, text: "#?#" });
    expect(result.error.code).toBe("FALLBACK_CORRUPT");
    expect(result.error.details).toEqual({ code: "LEVEL_PARSE_FAILED" });
  });
});

describe("selectFallback", () => {
  it("hands out a verified bank level", () => {
    const selection = selectFallback({ rng: new SeededRandom(7) });
    expect(selection.source).toBe("fallback");
    expect(selection.index).toBeGreaterThanOrEqual(0);
    expect(selection.index).toBeLessThan(FALLBACK_LEVELS.length);
    expect(selection.rejected).toEqual([]);
    expect(solvesFrom(selection.state, selection.solution)).toBe(true);
  });

  it("never repeats the previous level immediately", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const rng = new SeededRandom(seed);
      let previous = selectFallback({ rng }).index;
      for (let i = 0; i < 5; i++) {
        const next = selectFallback({ rng, previous }).index;
        expect(next).not.toBe(previous);
        previous = next;
      }
    }
  });

  it("skips corrupted entries and reports them", () => {
    const trace = new DefaultTraceCollector(true);
    const selection = selectFallback({
      rng: new SeededRandom(3),
      levels: [WRONG_SOLUTION, GOOD, UNSOLVABLE],
      trace,
    });

    expect(selection.index).toBe(1);
    expect(selection.rejected.map((r) => [r.index, r.name, r.error.code])).toEqual([
      [0, "wrong-solution", "FALLBACK_CORRUPT"],
      [2, "unsolvable", "FALLBACK_CORRUPT"],
    ]);
    const warnings = trace
      .getEventsByStage("fallback")
      .filter((event) => event.eventType === "warning");
    expect(warnings).toHaveLength(2);
  });

  it("repeats the only verified level rather than failing", () => {
    const selection = selectFallback({ rng: new SeededRandom(3), levels: [GOOD], previous: 0 });
    expect(selection.source).toBe("fallback");
    expect(selection.index).toBe(0);
  });

  it("falls back to the emergency level when nothing verifies", () => {
    const selection = selectFallback({
      rng: new SeededRandom(3),
      levels: [WRONG_SOLUTION, UNSOLVABLE],
    });
    expect(selection.source).toBe("emergency");
    expect(selection.index).toBe(-1);
    expect(selection.solution).toEqual(["R"]);
    expect(selection.rejected).toHaveLength(2);
    expect(solvesFrom(selection.state, selection.solution)).toBe(true);
  });
});
