/**
 * Shared puzzle vocabulary used by the engine and its collaborators
 * (renderers, input handlers, automated players).
 */

/**
 * One player step. A step onto a box is a push.
 */
export type Direction = "U" | "D" | "L" | "R";

/**
 * Ordered list of player steps. Empty means "already solved".
 */
export type Solution = readonly Direction[];

/**
 * Grid coordinate, row 0 at the top.
 */
export interface Position {
  readonly row: number;
  readonly col: number;
}

/**
 * Search-order of directions. The solver iterates in this order,
 * which makes its output deterministic.
 */
export const DIRECTION_ORDER: readonly Direction[] = ["U", "D", "L", "R"];

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  U: "D",
  D: "U",
  L: "R",
  R: "L",
};

export function oppositeDirection(direction: Direction): Direction {
  return OPPOSITES[direction];
}

/**
 * Row/column delta of a direction.
 */
export function directionDelta(direction: Direction): Position {
  switch (direction) {
    case "U":
      return { row: -1, col: 0 };
    case "D":
      return { row: 1, col: 0 };
    case "L":
      return { row: 0, col: -1 };
    case "R":
      return { row: 0, col: 1 };
  }
}
