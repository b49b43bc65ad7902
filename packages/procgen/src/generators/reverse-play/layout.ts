/**
 * Layout passes: the walls and goals reverse play starts from.
 */

import type { SeededRandom } from "@pushbox/contracts";
import { type Position, STEPS_4 } from "../../core/geometry/types";
import { Grid } from "../../core/grid/grid";
import { CellKind, type ReadonlyGrid } from "../../core/grid/types";
import type { TraceCollector } from "../../pipeline/types";
import { MIN_CARVABLE_DIMENSION } from "./constants";

// =============================================================================
// INTERNAL WALLS
// =============================================================================

/**
 * Stamp internal walls with bounded random walks.
 *
 * Walk count and walk length are both `floor((rows + cols) * complexity)`.
 * A walk that would step onto the outer ring jumps to a random interior
 * cell instead. Returns the number of cells turned into wall.
 */
export function carveInternalWalls(
  grid: Grid,
  complexity: number,
  rng: SeededRandom,
): number {
  const { rows, cols } = grid;
  if (rows <= MIN_CARVABLE_DIMENSION || cols <= MIN_CARVABLE_DIMENSION) return 0;

  const walks = Math.floor((rows + cols) * complexity);
  const walkLength = walks;
  const isInterior = (row: number, col: number) =>
    row >= 1 && row < rows - 1 && col >= 1 && col < cols - 1;

  let placed = 0;
  for (let walk = 0; walk < walks; walk++) {
    let row = rng.range(1, rows - 2);
    let col = rng.range(1, cols - 2);

    for (let i = 0; i < walkLength; i++) {
      if (grid.get(row, col) === CellKind.FLOOR) {
        grid.set(row, col, CellKind.WALL);
        placed++;
      }

      const step = STEPS_4[rng.range(0, STEPS_4.length - 1)];
      const nextRow = row + step.dRow;
      const nextCol = col + step.dCol;
      if (isInterior(nextRow, nextCol)) {
        row = nextRow;
        col = nextCol;
      } else {
        row = rng.range(1, rows - 2);
        col = rng.range(1, cols - 2);
      }
    }
  }

  return placed;
}

// =============================================================================
// GOALS
// =============================================================================

function touchesWall(grid: ReadonlyGrid, row: number, col: number): boolean {
  return STEPS_4.some(
    (step) => grid.get(row + step.dRow, col + step.dCol) === CellKind.WALL,
  );
}

/**
 * Place up to `count` goals on interior floor cells, wall-adjacent cells
 * first. Returns the goals placed, which may be fewer than asked for
 * when the layout has too little floor.
 */
export function placeGoals(
  grid: Grid,
  count: number,
  rng: SeededRandom,
): Position[] {
  const interior: Position[] = [];
  const walled: Position[] = [];
  for (let row = 1; row < grid.rows - 1; row++) {
    for (let col = 1; col < grid.cols - 1; col++) {
      if (grid.get(row, col) !== CellKind.FLOOR) continue;
      interior.push({ row, col });
      if (touchesWall(grid, row, col)) walled.push({ row, col });
    }
  }

  const placed: Position[] = [];
  const place = (candidates: readonly Position[]) => {
    for (const cell of rng.shuffle(candidates)) {
      if (placed.length >= count) return;
      if (grid.getAt(cell) !== CellKind.FLOOR) continue;
      grid.setAt(cell, CellKind.GOAL);
      placed.push(cell);
    }
  };

  place(walled);
  if (placed.length < count) place(interior);

  return placed;
}

// =============================================================================
// LAYOUT
// =============================================================================

export interface LayoutRequest {
  readonly rows: number;
  readonly cols: number;
  readonly complexity: number;
}

/**
 * Walled grid with carved internal walls. Goals are placed separately,
 * after the connectivity check.
 */
export function buildLayout(
  request: LayoutRequest,
  rng: SeededRandom,
  trace: TraceCollector,
): Grid {
  const grid = Grid.walled(request.rows, request.cols);
  const walls = carveInternalWalls(grid, request.complexity, rng);

  trace.decision(
    "layout",
    "How many internal walls?",
    [request.complexity],
    walls,
    `${walls} cells walled at complexity ${request.complexity.toFixed(3)}`,
  );

  return grid;
}
