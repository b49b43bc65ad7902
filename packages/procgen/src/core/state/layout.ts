/**
 * Static layout of a level: walls and goals, independent of where the
 * player and boxes stand.
 */

import type { Dimensions, Position, Step } from "../geometry/types";
import { CellKind, isGoalKind, type ReadonlyGrid } from "../grid/types";

/**
 * Walls and goals of a level, addressed by cell index (`row * cols + col`).
 *
 * Layout objects are shared by reference between every state derived
 * from the same level, which is what lets per-layout analysis (deadlock
 * squares) be computed once and reused.
 */
export interface Layout extends Dimensions {
  /** 1 where the cell is a wall */
  readonly walls: Uint8Array;
  /** 1 where the cell is a goal */
  readonly goalMask: Uint8Array;
  /** Goal cell indices, ascending */
  readonly goals: readonly number[];
}

export function layoutFromGrid(grid: ReadonlyGrid): Layout {
  const size = grid.rows * grid.cols;
  const walls = new Uint8Array(size);
  const goalMask = new Uint8Array(size);
  const goals: number[] = [];

  grid.forEach((row, col, kind) => {
    const index = row * grid.cols + col;
    if (kind === CellKind.WALL) walls[index] = 1;
    if (isGoalKind(kind)) {
      goalMask[index] = 1;
      goals.push(index);
    }
  });

  return { rows: grid.rows, cols: grid.cols, walls, goalMask, goals };
}

/**
 * Index of the neighbouring cell in a direction, or -1 when it would
 * leave the grid.
 */
export function neighborIndex(dims: Dimensions, index: number, step: Step): number {
  const row = Math.floor(index / dims.cols) + step.dRow;
  const col = (index % dims.cols) + step.dCol;
  if (row < 0 || row >= dims.rows || col < 0 || col >= dims.cols) return -1;
  return row * dims.cols + col;
}

/**
 * Out-of-bounds cells count as walls.
 */
export function isWallAt(layout: Layout, index: number): boolean {
  return index < 0 || layout.walls[index] === 1;
}

export function isGoalAt(layout: Layout, index: number): boolean {
  return index >= 0 && layout.goalMask[index] === 1;
}

export function toPosition(dims: Dimensions, index: number): Position {
  return { row: Math.floor(index / dims.cols), col: index % dims.cols };
}

export function toIndex(dims: Dimensions, p: Position): number {
  return p.row * dims.cols + p.col;
}
