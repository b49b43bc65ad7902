/**
 * Four-directional flood fill over grid cells.
 */

import type { Dimensions, Position } from "../geometry/types";
import { CellKind, type ReadonlyGrid } from "./types";

/**
 * Flood fill over cell indices (`row * cols + col`).
 *
 * Returns a mask with 1 for every reached cell. The start cell is
 * always reached when it is in bounds, whether or not it is passable,
 * so a player standing on any cell can expand from it.
 */
export function floodFillIndices(
  dims: Dimensions,
  start: number,
  passable: (index: number) => boolean,
): Uint8Array {
  const { rows, cols } = dims;
  const total = rows * cols;
  const visited = new Uint8Array(total);
  if (start < 0 || start >= total) return visited;

  const queue = new Int32Array(total);
  let head = 0;
  let tail = 0;
  queue[tail++] = start;
  visited[start] = 1;

  while (head < tail) {
    const current = queue[head++];
    const row = Math.floor(current / cols);
    const col = current - row * cols;

    if (row > 0) {
      const next = current - cols;
      if (visited[next] === 0 && passable(next)) {
        visited[next] = 1;
        queue[tail++] = next;
      }
    }
    if (row < rows - 1) {
      const next = current + cols;
      if (visited[next] === 0 && passable(next)) {
        visited[next] = 1;
        queue[tail++] = next;
      }
    }
    if (col > 0) {
      const next = current - 1;
      if (visited[next] === 0 && passable(next)) {
        visited[next] = 1;
        queue[tail++] = next;
      }
    }
    if (col < cols - 1) {
      const next = current + 1;
      if (visited[next] === 0 && passable(next)) {
        visited[next] = 1;
        queue[tail++] = next;
      }
    }
  }

  return visited;
}

/**
 * Flood fill from a position through cells whose kind passes the filter.
 *
 * @example
 * ```typescript
 * const room = floodFill(grid, { row: 1, col: 1 }, (kind) => kind !== CellKind.WALL);
 * ```
 */
export function floodFill(
  grid: ReadonlyGrid,
  start: Position,
  passable: (kind: CellKind) => boolean,
): Position[] {
  if (!grid.isInBounds(start.row, start.col)) return [];
  if (!passable(grid.getAt(start))) return [];

  const mask = floodFillIndices(
    grid.getDimensions(),
    grid.indexOf(start.row, start.col),
    (index) => {
      const p = grid.positionOf(index);
      return passable(grid.get(p.row, p.col));
    },
  );

  const points: Position[] = [];
  for (let i = 0; i < mask.length; i++) {
    if (mask[i] === 1) points.push(grid.positionOf(i));
  }
  return points;
}

/**
 * True when every non-wall cell is reachable from every other one.
 * A grid with no open cell is not connected.
 *
 * Pure: repeated calls on an unmodified grid return the same answer.
 */
export function isConnected(grid: ReadonlyGrid): boolean {
  const open = (kind: CellKind) => kind !== CellKind.WALL;
  const openCells = grid.findAll(open);
  const first = openCells[0];
  if (!first) return false;

  return floodFill(grid, first, open).length === openCells.length;
}
