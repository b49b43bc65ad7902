/**
 * Core geometry for four-directional grid movement.
 */

import type { Direction, Position } from "@pushbox/contracts";

export type { Direction, Position };

/**
 * Grid dimensions
 */
export interface Dimensions {
  readonly rows: number;
  readonly cols: number;
}

/**
 * Direction with its row/column delta
 */
export interface Step {
  readonly direction: Direction;
  readonly dRow: number;
  readonly dCol: number;
}

/**
 * The four steps in search order (U, D, L, R).
 */
export const STEPS_4: readonly Step[] = [
  { direction: "U", dRow: -1, dCol: 0 },
  { direction: "D", dRow: 1, dCol: 0 },
  { direction: "L", dRow: 0, dCol: -1 },
  { direction: "R", dRow: 0, dCol: 1 },
] as const;

const STEP_BY_DIRECTION: Readonly<Record<Direction, Step>> = {
  U: { direction: "U", dRow: -1, dCol: 0 },
  D: { direction: "D", dRow: 1, dCol: 0 },
  L: { direction: "L", dRow: 0, dCol: -1 },
  R: { direction: "R", dRow: 0, dCol: 1 },
};

export function stepOf(direction: Direction): Step {
  return STEP_BY_DIRECTION[direction];
}
