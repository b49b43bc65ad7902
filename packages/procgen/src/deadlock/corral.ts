/**
 * Corral deadlocks: boxes the player cannot get next to.
 */

import { STEPS_4 } from "../core/geometry/types";
import { floodFillIndices } from "../core/grid/flood-fill";
import { boxMask, type GameState } from "../core/state/game-state";
import { neighborIndex } from "../core/state/layout";

/**
 * Cells the player can walk to without pushing anything.
 */
export function playerReach(state: GameState, boxes = boxMask(state)): Uint8Array {
  const { walls } = state.layout;
  return floodFillIndices(
    state.layout,
    state.player,
    (index) => walls[index] === 0 && boxes[index] === 0,
  );
}

/**
 * First non-goal box with no player-reachable neighbour, or -1.
 */
export function findCorralledBox(
  state: GameState,
  boxes = boxMask(state),
): number {
  const reach = playerReach(state, boxes);
  for (const box of state.boxes) {
    if (state.layout.goalMask[box] === 1) continue;
    const touchable = STEPS_4.some((step) => {
      const next = neighborIndex(state.layout, box, step);
      return next !== -1 && reach[next] === 1;
    });
    if (!touchable) return box;
  }
  return -1;
}
