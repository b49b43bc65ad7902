/**
 * Freeze deadlocks: boxes that can no longer move on either axis.
 */

import type { Step } from "../core/geometry/types";
import { stepOf } from "../core/geometry/types";
import { boxMask, type GameState } from "../core/state/game-state";
import { isWallAt, neighborIndex } from "../core/state/layout";

type Axis = "horizontal" | "vertical";

const AXIS_STEPS: Readonly<Record<Axis, readonly [Step, Step]>> = {
  horizontal: [stepOf("L"), stepOf("R")],
  vertical: [stepOf("U"), stepOf("D")],
};

const PERPENDICULAR: Readonly<Record<Axis, Axis>> = {
  horizontal: "vertical",
  vertical: "horizontal",
};

/**
 * A box is blocked on an axis when both of its neighbours on that axis
 * are walls, or boxes blocked on the other axis. Boxes on goals never
 * count as blocked. `path` holds the boxes on the current chain; meeting
 * one of them again counts as blocked.
 */
function isBlocked(
  state: GameState,
  boxes: Uint8Array,
  box: number,
  axis: Axis,
  path: Set<number>,
): boolean {
  if (path.has(box)) return true;
  if (state.layout.goalMask[box] === 1) return false;

  path.add(box);
  const blocked = AXIS_STEPS[axis].every((step) => {
    const next = neighborIndex(state.layout, box, step);
    if (isWallAt(state.layout, next)) return true;
    if (boxes[next] === 1) {
      return isBlocked(state, boxes, next, PERPENDICULAR[axis], path);
    }
    return false;
  });
  path.delete(box);

  return blocked;
}

/**
 * First non-goal box frozen on both axes, or -1.
 *
 * @param boxes - box mask of `state`, when the caller already has one
 */
export function findFrozenBox(state: GameState, boxes = boxMask(state)): number {
  for (const box of state.boxes) {
    if (state.layout.goalMask[box] === 1) continue;
    if (
      isBlocked(state, boxes, box, "horizontal", new Set()) &&
      isBlocked(state, boxes, box, "vertical", new Set())
    ) {
      return box;
    }
  }
  return -1;
}
