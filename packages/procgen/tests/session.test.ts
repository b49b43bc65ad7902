/**
 * Puzzle session unit tests
 */

import { describe, expect, it } from "vitest";
import { stateKey } from "../src/core/state";
import { PuzzleSession } from "../src/session";
import { levelState } from "../src/testing";

const FIXTURE = ["#####", "#@  #", "# $.#", "#   #", "#####"];

function fixtureSession(historyLimit?: number): PuzzleSession {
  return new PuzzleSession(levelState(FIXTURE), { solution: ["D", "R"], historyLimit });
}

describe("PuzzleSession", () => {
  it("advances the attached solution while the player follows it", () => {
    const session = fixtureSession();
    expect(session.hint()).toBe("D");

    session.move("D");
    expect(session.solution).toEqual(["R"]);
    expect(session.hint()).toBe("R");

    const outcome = session.move("R");
    expect(outcome.pushed).toBe(true);
    expect(session.isSolved()).toBe(true);
    expect(session.hint()).toBeNull();
    expect(session.moveCount).toBe(2);
  });

  it("recomputes the solution after the player departs from it", () => {
    const session = fixtureSession();
    session.move("R");
    expect(session.solution).toBeNull();

    expect(session.hint()).toBe("L");
    expect(session.solution).toEqual(["L", "D", "R"]);
  });

  it("hands out solutions that later moves do not change", () => {
    const session = fixtureSession();
    const attached = session.solution;
    const regenerated = session.regenerateSolution();
    expect(regenerated).toEqual(["D", "R"]);

    session.move("D");
    expect(attached).toEqual(["D", "R"]);
    expect(regenerated).toEqual(["D", "R"]);
    expect(session.solution).toEqual(["R"]);
  });

  it("ignores blocked moves", () => {
    const session = fixtureSession();
    const outcome = session.move("U");
    expect(outcome.moved).toBe(false);
    expect(session.historySize).toBe(0);
    expect(session.moveCount).toBe(0);
    expect(session.solution).toEqual(["D", "R"]);
  });

  it("undoes moves", () => {
    const session = fixtureSession();
    const start = stateKey(session.state);

    expect(session.undo()).toBe(false);
    session.move("D");
    expect(session.canUndo).toBe(true);
    expect(session.undo()).toBe(true);
    expect(stateKey(session.state)).toBe(start);
    expect(session.moveCount).toBe(0);
  });

  it("resets to the initial state and solution", () => {
    const session = fixtureSession();
    session.move("R");
    session.move("D");
    session.reset();

    expect(stateKey(session.state)).toBe(stateKey(levelState(FIXTURE)));
    expect(session.solution).toEqual(["D", "R"]);
    expect(session.canUndo).toBe(false);
    expect(session.moveCount).toBe(0);
  });

  it("drops the oldest history entries past the limit", () => {
    const session = fixtureSession(2);
    session.move("R");
    session.move("L");
    session.move("R");
    expect(session.historySize).toBe(2);

    session.undo();
    session.undo();
    expect(session.undo()).toBe(false);
    expect(session.moveCount).toBe(1);
  });
});
