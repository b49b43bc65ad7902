/**
 * Static deadlock squares: cells from which a box can never reach a
 * goal, whatever the other boxes do. Depends on walls and goals only.
 */

import { STEPS_4 } from "../core/geometry/types";
import type { GameState } from "../core/state/game-state";
import { type Layout, isWallAt, neighborIndex } from "../core/state/layout";

const squareCache = new WeakMap<Layout, Uint8Array>();

function computeDeadlockSquares(layout: Layout): Uint8Array {
  const size = layout.rows * layout.cols;
  const live = new Uint8Array(size);
  const queue = new Int32Array(size);
  let head = 0;
  let tail = 0;

  for (const goal of layout.goals) {
    if (layout.walls[goal] === 1 || live[goal] === 1) continue;
    live[goal] = 1;
    queue[tail++] = goal;
  }

  // Walk the pull relation backwards: a box at `from` can be pushed to
  // `cell` when the player can stand one further cell beyond it.
  while (head < tail) {
    const cell = queue[head++];
    for (const step of STEPS_4) {
      const from = neighborIndex(layout, cell, step);
      if (isWallAt(layout, from) || live[from] === 1) continue;
      const pusher = neighborIndex(layout, from, step);
      if (isWallAt(layout, pusher)) continue;
      live[from] = 1;
      queue[tail++] = from;
    }
  }

  const dead = new Uint8Array(size);
  for (let index = 0; index < size; index++) {
    if (layout.walls[index] === 0 && live[index] === 0) dead[index] = 1;
  }
  return dead;
}

/**
 * Mask with 1 for every floor cell a box must never enter. Computed once
 * per layout object and cached.
 */
export function deadlockSquares(layout: Layout): Uint8Array {
  let squares = squareCache.get(layout);
  if (!squares) {
    squares = computeDeadlockSquares(layout);
    squareCache.set(layout, squares);
  }
  return squares;
}

/**
 * First non-goal box standing on a deadlock square, or -1.
 */
export function findSimpleDeadlock(state: GameState): number {
  const squares = deadlockSquares(state.layout);
  for (const box of state.boxes) {
    if (squares[box] === 1 && state.layout.goalMask[box] === 0) return box;
  }
  return -1;
}
