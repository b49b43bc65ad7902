/**
 * Forward transition rule: walk, or push a single box one cell.
 */

import type { Direction } from "../geometry/types";
import { stepOf } from "../geometry/types";
import type { GameState } from "./game-state";
import { isWallAt, neighborIndex } from "./layout";

export interface MoveOutcome {
  readonly state: GameState;
  /** False when the move was blocked; `state` is then the input state */
  readonly moved: boolean;
  readonly pushed: boolean;
}

export interface ReplayOutcome {
  readonly state: GameState;
  /** Moves applied before the first blocked one */
  readonly applied: number;
  /** Index of the first blocked move, if any */
  readonly blockedAt?: number;
}

/**
 * Apply one move. Moving into a wall or off the grid, or pushing a box
 * into a wall, another box or off the grid, leaves the state unchanged.
 */
export function applyMove(state: GameState, direction: Direction): MoveOutcome {
  const { layout } = state;
  const step = stepOf(direction);
  const target = neighborIndex(layout, state.player, step);

  if (isWallAt(layout, target)) {
    return { state, moved: false, pushed: false };
  }

  const boxSlot = state.boxes.indexOf(target);
  if (boxSlot === -1) {
    return {
      state: { layout, player: target, boxes: state.boxes },
      moved: true,
      pushed: false,
    };
  }

  const beyond = neighborIndex(layout, target, step);
  if (isWallAt(layout, beyond) || state.boxes.includes(beyond)) {
    return { state, moved: false, pushed: false };
  }

  const boxes = state.boxes.slice();
  boxes[boxSlot] = beyond;
  boxes.sort((a, b) => a - b);

  return {
    state: { layout, player: target, boxes },
    moved: true,
    pushed: true,
  };
}

/**
 * Apply a move sequence, stopping at the first blocked move.
 */
export function replay(
  state: GameState,
  moves: readonly Direction[],
): ReplayOutcome {
  let current = state;
  for (let i = 0; i < moves.length; i++) {
    const move = moves[i];
    if (move === undefined) break;
    const outcome = applyMove(current, move);
    if (!outcome.moved) {
      return { state: current, applied: i, blockedAt: i };
    }
    current = outcome.state;
  }
  return { state: current, applied: moves.length };
}
