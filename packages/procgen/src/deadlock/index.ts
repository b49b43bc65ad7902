/**
 * Deadlock classifier: simple, freeze and corral detectors composed
 * into one verdict.
 */

import type { Position } from "../core/geometry/types";
import { boxMask, type GameState } from "../core/state/game-state";
import { toPosition } from "../core/state/layout";
import { findCorralledBox } from "./corral";
import { findFrozenBox } from "./freeze";
import { findSimpleDeadlock } from "./simple";

export type DeadlockKind = "simple" | "freeze" | "corral";

export interface DeadlockVerdict {
  readonly kind: DeadlockKind;
  /** The box that triggered the verdict */
  readonly box: Position;
}

/**
 * Run the detectors cheapest first and report the first that fires.
 * Boxes on goals are never reported.
 */
export function classifyDeadlock(state: GameState): DeadlockVerdict | null {
  if (state.boxes.length === 0) return null;

  const simple = findSimpleDeadlock(state);
  if (simple !== -1) {
    return { kind: "simple", box: toPosition(state.layout, simple) };
  }

  const boxes = boxMask(state);
  const frozen = findFrozenBox(state, boxes);
  if (frozen !== -1) {
    return { kind: "freeze", box: toPosition(state.layout, frozen) };
  }

  const corralled = findCorralledBox(state, boxes);
  if (corralled !== -1) {
    return { kind: "corral", box: toPosition(state.layout, corralled) };
  }

  return null;
}

export function hasDeadlock(state: GameState): boolean {
  return classifyDeadlock(state) !== null;
}

export { deadlockSquares, findSimpleDeadlock } from "./simple";
export { findFrozenBox } from "./freeze";
export { findCorralledBox, playerReach } from "./corral";
