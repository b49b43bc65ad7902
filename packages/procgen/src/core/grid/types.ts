/**
 * Grid types for box-pushing levels.
 */

import type { Dimensions, Position } from "../geometry/types";

/**
 * Cell kinds of a level grid.
 *
 * Box and BoxOnGoal both mean "a box is here"; Goal, BoxOnGoal and
 * PlayerOnGoal all mark a goal cell.
 */
export const CellKind = {
  WALL: 0,
  FLOOR: 1,
  GOAL: 2,
  BOX: 3,
  BOX_ON_GOAL: 4,
  PLAYER: 5,
  PLAYER_ON_GOAL: 6,
} as const;

export type CellKind = (typeof CellKind)[keyof typeof CellKind];

export function isGoalKind(kind: CellKind): boolean {
  return (
    kind === CellKind.GOAL ||
    kind === CellKind.BOX_ON_GOAL ||
    kind === CellKind.PLAYER_ON_GOAL
  );
}

export function isBoxKind(kind: CellKind): boolean {
  return kind === CellKind.BOX || kind === CellKind.BOX_ON_GOAL;
}

export function isPlayerKind(kind: CellKind): boolean {
  return kind === CellKind.PLAYER || kind === CellKind.PLAYER_ON_GOAL;
}

/**
 * Read-only grid interface.
 *
 * The classifier, solver and validators take this type; they never
 * write to a caller's grid.
 */
export interface ReadonlyGrid {
  readonly rows: number;
  readonly cols: number;

  isInBounds(row: number, col: number): boolean;
  get(row: number, col: number): CellKind;
  getAt(p: Position): CellKind;
  indexOf(row: number, col: number): number;
  positionOf(index: number): Position;
  getDimensions(): Dimensions;
  forEach(callback: (row: number, col: number, kind: CellKind) => void): void;
  findAll(predicate: (kind: CellKind) => boolean): Position[];
  countCells(predicate: (kind: CellKind) => boolean): number;
  getRow(row: number): CellKind[];
  clone(): MutableGrid;
  equals(other: ReadonlyGrid): boolean;
}

/**
 * Mutable grid interface, used while a layout is being built.
 */
export interface MutableGrid extends ReadonlyGrid {
  set(row: number, col: number, kind: CellKind): void;
  setAt(p: Position, kind: CellKind): void;
  fill(kind: CellKind): void;
}
