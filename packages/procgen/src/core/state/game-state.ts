/**
 * Search projection of a level: player, boxes and the shared layout.
 */

import { PuzzleError, Result } from "@pushbox/contracts";
import type { Position } from "../geometry/types";
import { Grid } from "../grid/grid";
import {
  CellKind,
  isBoxKind,
  isGoalKind,
  isPlayerKind,
  type ReadonlyGrid,
} from "../grid/types";
import { type Layout, layoutFromGrid, toIndex, toPosition } from "./layout";

/**
 * Immutable game state. Every transition returns a new object; the
 * layout reference is carried over unchanged.
 */
export interface GameState {
  readonly layout: Layout;
  /** Player cell index */
  readonly player: number;
  /** Box cell indices, ascending and unique */
  readonly boxes: readonly number[];
}

export interface LocatedPieces {
  readonly player: Position;
  readonly boxes: readonly Position[];
}

export function createState(
  layout: Layout,
  player: number,
  boxes: Iterable<number>,
): GameState {
  const sorted = Array.from(new Set(boxes)).sort((a, b) => a - b);
  return { layout, player, boxes: sorted };
}

/**
 * Visited-set key: equal for states with the same player cell and the
 * same box set, whatever order the boxes were listed in.
 */
export function stateKey(state: GameState): string {
  return `${state.player}:${state.boxes.join(",")}`;
}

/**
 * 1 where a box stands.
 */
export function boxMask(state: GameState): Uint8Array {
  const mask = new Uint8Array(state.layout.rows * state.layout.cols);
  for (const box of state.boxes) mask[box] = 1;
  return mask;
}

export function playerPosition(state: GameState): Position {
  return toPosition(state.layout, state.player);
}

export function boxPositions(state: GameState): Position[] {
  return state.boxes.map((box) => toPosition(state.layout, box));
}

/**
 * Find the player and boxes. Zero or several player markers make the
 * level invalid.
 */
export function locate(grid: ReadonlyGrid): Result<LocatedPieces, PuzzleError> {
  const players = grid.findAll(isPlayerKind);
  const boxes = grid.findAll(isBoxKind);
  const [player] = players;

  if (!player) {
    return Result.err(
      new PuzzleError("LEVEL_PLAYER_MISSING", "Level has no player marker"),
    );
  }
  if (players.length > 1) {
    return Result.err(
      new PuzzleError(
        "LEVEL_MULTIPLE_PLAYERS",
        `Level has ${players.length} player markers`,
        { players: players.length },
      ),
    );
  }
  return Result.ok({ player, boxes });
}

/**
 * Goal cells: Goal, BoxOnGoal and PlayerOnGoal.
 */
export function goals(grid: ReadonlyGrid): Position[] {
  return grid.findAll(isGoalKind);
}

/**
 * True when boxes and goals are the same non-empty set of cells.
 */
export function isSolved(
  boxes: readonly Position[],
  goalCells: readonly Position[],
): boolean {
  const boxKeys = new Set(boxes.map((p) => `${p.row},${p.col}`));
  const goalKeys = new Set(goalCells.map((p) => `${p.row},${p.col}`));
  if (boxKeys.size === 0 || goalKeys.size === 0) return false;
  if (boxKeys.size !== goalKeys.size) return false;
  for (const key of boxKeys) {
    if (!goalKeys.has(key)) return false;
  }
  return true;
}

/**
 * Index-based form of {@link isSolved} for search states.
 */
export function isStateSolved(state: GameState): boolean {
  const { boxes } = state;
  const { goals: goalCells } = state.layout;
  if (boxes.length === 0 || boxes.length !== goalCells.length) return false;
  // both ascending
  for (let i = 0; i < boxes.length; i++) {
    if (boxes[i] !== goalCells[i]) return false;
  }
  return true;
}

export function countBoxesOnGoals(state: GameState): number {
  let count = 0;
  for (const box of state.boxes) {
    if (state.layout.goalMask[box] === 1) count++;
  }
  return count;
}

export function stateFromGrid(grid: ReadonlyGrid): Result<GameState, PuzzleError> {
  return locate(grid).map(({ player, boxes }) =>
    createState(
      layoutFromGrid(grid),
      toIndex(grid, player),
      boxes.map((box) => toIndex(grid, box)),
    ),
  );
}

/**
 * Derive the cell-kind grid of a state.
 */
export function stateToGrid(state: GameState): Grid {
  const { layout } = state;
  const grid = new Grid(layout.rows, layout.cols, CellKind.FLOOR);

  for (let index = 0; index < layout.walls.length; index++) {
    const { row, col } = toPosition(layout, index);
    if (layout.walls[index] === 1) {
      grid.set(row, col, CellKind.WALL);
    } else if (layout.goalMask[index] === 1) {
      grid.set(row, col, CellKind.GOAL);
    }
  }

  for (const box of state.boxes) {
    const { row, col } = toPosition(layout, box);
    grid.set(
      row,
      col,
      layout.goalMask[box] === 1 ? CellKind.BOX_ON_GOAL : CellKind.BOX,
    );
  }

  const player = toPosition(layout, state.player);
  grid.set(
    player.row,
    player.col,
    layout.goalMask[state.player] === 1
      ? CellKind.PLAYER_ON_GOAL
      : CellKind.PLAYER,
  );

  return grid;
}
