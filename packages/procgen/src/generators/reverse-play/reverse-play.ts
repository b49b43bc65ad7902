/**
 * Reverse play: start from the solved configuration and pull boxes away
 * from their goals. Every state reached this way can be pushed back to
 * solved, and the recorded moves replay forward from the final state.
 */

import {
  type Direction,
  oppositeDirection,
  type SeededRandom,
} from "@pushbox/contracts";
import { STEPS_4, stepOf } from "../../core/geometry/types";
import type { ReadonlyGrid } from "../../core/grid/types";
import { createState, type GameState } from "../../core/state/game-state";
import {
  isWallAt,
  type Layout,
  layoutFromGrid,
  neighborIndex,
} from "../../core/state/layout";
import { hasDeadlock } from "../../deadlock";
import type { TraceCollector } from "../../pipeline/types";
import { solve } from "../../solver/bfs";
import type { Violation } from "../../validation/result-types";
import { validateState } from "../../validation/validate-level";
import { ATTEMPTS_PER_STEP } from "./constants";

export interface ReversePlayOptions {
  /** Inclusive range the target step count is drawn from */
  readonly steps: readonly [number, number];
  /** Fewer accumulated steps than this rejects the level as trivial */
  readonly minSteps: number;
  readonly solverIterations: number;
  readonly trace: TraceCollector;
}

export type ReversePlayFailureReason =
  | "goal-mismatch"
  | "no-floor"
  | "too-trivial"
  | "unsolvable"
  | "invalid";

export interface ReversePlaySuccess {
  readonly success: true;
  readonly state: GameState;
  /** Shortest solution found by the forward solver */
  readonly solution: Direction[];
  /** The recorded pulls and steps, as forward moves */
  readonly playback: Direction[];
  readonly steps: number;
  readonly pulls: number;
  readonly attempts: number;
}

export interface ReversePlayFailure {
  readonly success: false;
  readonly reason: ReversePlayFailureReason;
  readonly steps: number;
  readonly attempts: number;
  readonly violations?: readonly Violation[];
}

export type ReversePlayResult = ReversePlaySuccess | ReversePlayFailure;

interface Transition {
  readonly state: GameState;
  /** Forward move that undoes the transition */
  readonly forward: Direction;
}

function isFree(state: GameState, index: number): boolean {
  return !isWallAt(state.layout, index) && !state.boxes.includes(index);
}

/**
 * Every pull open to the player. The player stands next to a box and
 * backs away from it into a free cell; the box follows into the cell the
 * player left. Pulls whose result is deadlocked are dropped.
 */
export function legalPulls(state: GameState): Transition[] {
  const pulls: Transition[] = [];
  const { layout, player } = state;

  for (const step of STEPS_4) {
    const box = neighborIndex(layout, player, step);
    if (box === -1 || !state.boxes.includes(box)) continue;

    const back = neighborIndex(layout, player, stepOf(oppositeDirection(step.direction)));
    if (!isFree(state, back)) continue;

    const boxes = state.boxes.map((b) => (b === box ? player : b));
    const next = createState(layout, back, boxes);
    if (hasDeadlock(next)) continue;

    pulls.push({ state: next, forward: step.direction });
  }

  return pulls;
}

/**
 * Player steps into free neighbouring cells, without touching a box.
 */
export function repositioningSteps(state: GameState): Transition[] {
  const steps: Transition[] = [];
  for (const step of STEPS_4) {
    const target = neighborIndex(state.layout, state.player, step);
    if (!isFree(state, target)) continue;
    steps.push({
      state: { layout: state.layout, player: target, boxes: state.boxes },
      forward: oppositeDirection(step.direction),
    });
  }
  return steps;
}

function pickStart(layout: Layout, rng: SeededRandom): number {
  const boxes = new Set(layout.goals);
  const floor: number[] = [];
  const nextToBox: number[] = [];

  for (let index = 0; index < layout.walls.length; index++) {
    if (layout.walls[index] === 1 || boxes.has(index)) continue;
    floor.push(index);
    const touches = STEPS_4.some((step) =>
      boxes.has(neighborIndex(layout, index, step)),
    );
    if (touches) nextToBox.push(index);
  }

  return rng.choice(nextToBox) ?? rng.choice(floor) ?? -1;
}

/**
 * Generate a level by reverse play from the solved configuration of
 * `layoutGrid` (walls, floor and goals; any boxes or player on it are
 * ignored).
 *
 * Each attempt either applies a random legal pull or, when none exists,
 * a random repositioning step; both consume one attempt and count as one
 * step. The result is checked by the forward solver and the validity
 * rules before it is returned.
 */
export function reversePlay(
  layoutGrid: ReadonlyGrid,
  boxCount: number,
  rng: SeededRandom,
  options: ReversePlayOptions,
): ReversePlayResult {
  const { trace } = options;
  const layout = layoutFromGrid(layoutGrid);

  if (layout.goals.length === 0 || layout.goals.length !== boxCount) {
    return { success: false, reason: "goal-mismatch", steps: 0, attempts: 0 };
  }

  const start = pickStart(layout, rng);
  if (start === -1) {
    return { success: false, reason: "no-floor", steps: 0, attempts: 0 };
  }

  const [minTarget, maxTarget] = options.steps;
  const target = rng.range(minTarget, maxTarget);
  const maxAttempts = target * ATTEMPTS_PER_STEP;
  trace.decision(
    "reverse-play",
    "How many reverse steps?",
    [minTarget, maxTarget],
    target,
    `Up to ${maxAttempts} attempts`,
  );

  let state = createState(layout, start, layout.goals);
  const moves: Direction[] = [];
  let steps = 0;
  let pulls = 0;
  let attempts = 0;

  while (steps < target && attempts < maxAttempts) {
    attempts++;

    const candidates = legalPulls(state);
    const isPull = candidates.length > 0;
    const chosen = rng.choice(isPull ? candidates : repositioningSteps(state));
    if (!chosen) continue;

    state = chosen.state;
    moves.push(chosen.forward);
    steps++;
    if (isPull) pulls++;
  }

  if (steps < options.minSteps) {
    trace.warning("reverse-play", "Too few reverse steps", { steps, attempts });
    return { success: false, reason: "too-trivial", steps, attempts };
  }

  const verification = solve(state, { maxIterations: options.solverIterations });
  if (!verification.found) {
    trace.warning("verification", "Forward solve failed", {
      reason: verification.reason,
      iterations: verification.iterations,
    });
    return { success: false, reason: "unsolvable", steps, attempts };
  }
  trace.decision(
    "verification",
    "Is the level solvable?",
    [true, false],
    true,
    `Solved in ${verification.moves.length} moves after ${verification.iterations} iterations`,
  );

  const validity = validateState(state);
  if (!validity.success) {
    trace.warning("validation", "Level rejected", {
      violations: validity.violations.map((v) => v.type),
    });
    return {
      success: false,
      reason: "invalid",
      steps,
      attempts,
      violations: validity.violations,
    };
  }

  return {
    success: true,
    state,
    solution: verification.moves,
    playback: moves.reverse(),
    steps,
    pulls,
    attempts,
  };
}
