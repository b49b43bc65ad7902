/**
 * Level grid backed by a flat Uint8Array of cell kinds.
 */

import type { Dimensions, Position } from "../geometry/types";
import { CellKind, type MutableGrid, type ReadonlyGrid } from "./types";

/**
 * Rectangular grid of cell kinds, stored row-major.
 *
 * Reads outside the grid return WALL, so a missing boundary behaves
 * like a closed one; writes outside the grid throw.
 */
export class Grid implements MutableGrid {
  readonly rows: number;
  readonly cols: number;
  private readonly data: Uint8Array;

  constructor(rows: number, cols: number, initialKind: CellKind = CellKind.FLOOR) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new RangeError(`Invalid grid dimensions: ${rows}x${cols}`);
    }

    this.rows = rows;
    this.cols = cols;
    this.data = new Uint8Array(rows * cols);
    this.data.fill(initialKind);
  }

  /**
   * Build a grid from rows of cell kinds. Rows must have equal length.
   */
  static fromRows(rows: readonly (readonly CellKind[])[]): Grid {
    const width = rows[0]?.length ?? 0;
    const grid = new Grid(rows.length, width);
    rows.forEach((cells, row) => {
      if (cells.length !== width) {
        throw new RangeError(
          `Row ${row} has ${cells.length} cells, expected ${width}`,
        );
      }
      cells.forEach((kind, col) => grid.set(row, col, kind));
    });
    return grid;
  }

  /**
   * Grid of the given size with a closed wall ring and floor inside.
   */
  static walled(rows: number, cols: number): Grid {
    const grid = new Grid(rows, cols, CellKind.FLOOR);
    for (let col = 0; col < cols; col++) {
      grid.set(0, col, CellKind.WALL);
      grid.set(rows - 1, col, CellKind.WALL);
    }
    for (let row = 0; row < rows; row++) {
      grid.set(row, 0, CellKind.WALL);
      grid.set(row, cols - 1, CellKind.WALL);
    }
    return grid;
  }

  // ===========================================================================
  // BOUNDS AND ADDRESSING
  // ===========================================================================

  isInBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  indexOf(row: number, col: number): number {
    return row * this.cols + col;
  }

  positionOf(index: number): Position {
    return { row: Math.floor(index / this.cols), col: index % this.cols };
  }

  getDimensions(): Dimensions {
    return { rows: this.rows, cols: this.cols };
  }

  // ===========================================================================
  // CELL ACCESS
  // ===========================================================================

  get(row: number, col: number): CellKind {
    if (!this.isInBounds(row, col)) return CellKind.WALL;
    return this.data[row * this.cols + col] as CellKind;
  }

  getAt(p: Position): CellKind {
    return this.get(p.row, p.col);
  }

  set(row: number, col: number, kind: CellKind): void {
    if (!this.isInBounds(row, col)) {
      throw new RangeError(
        `Grid.set: out of bounds (${row}, ${col}) for grid ${this.rows}x${this.cols}`,
      );
    }
    this.data[row * this.cols + col] = kind;
  }

  setAt(p: Position, kind: CellKind): void {
    this.set(p.row, p.col, kind);
  }

  fill(kind: CellKind): void {
    this.data.fill(kind);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  forEach(callback: (row: number, col: number, kind: CellKind) => void): void {
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        callback(row, col, this.data[row * this.cols + col] as CellKind);
      }
    }
  }

  findAll(predicate: (kind: CellKind) => boolean): Position[] {
    const found: Position[] = [];
    this.forEach((row, col, kind) => {
      if (predicate(kind)) found.push({ row, col });
    });
    return found;
  }

  countCells(predicate: (kind: CellKind) => boolean): number {
    let count = 0;
    for (let i = 0; i < this.data.length; i++) {
      if (predicate(this.data[i] as CellKind)) count++;
    }
    return count;
  }

  getRow(row: number): CellKind[] {
    const cells: CellKind[] = [];
    for (let col = 0; col < this.cols; col++) {
      cells.push(this.get(row, col));
    }
    return cells;
  }

  clone(): Grid {
    const copy = new Grid(this.rows, this.cols);
    copy.data.set(this.data);
    return copy;
  }

  equals(other: ReadonlyGrid): boolean {
    if (other.rows !== this.rows || other.cols !== this.cols) return false;
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        if (other.get(row, col) !== this.get(row, col)) return false;
      }
    }
    return true;
  }
}
