/**
 * Grid class unit tests
 */

import { describe, expect, it } from "vitest";
import { CellKind, Grid } from "../src/core/grid";

describe("Grid", () => {
  describe("construction", () => {
    it("creates grid with correct dimensions", () => {
      const grid = new Grid(7, 9);
      expect(grid.rows).toBe(7);
      expect(grid.cols).toBe(9);
      expect(grid.getDimensions()).toEqual({ rows: 7, cols: 9 });
    });

    it("initializes with default fill value (FLOOR)", () => {
      const grid = new Grid(4, 4);
      expect(grid.get(0, 0)).toBe(CellKind.FLOOR);
      expect(grid.get(3, 3)).toBe(CellKind.FLOOR);
    });

    it("rejects non-positive dimensions", () => {
      expect(() => new Grid(0, 5)).toThrow(RangeError);
      expect(() => new Grid(5, -1)).toThrow(RangeError);
    });

    it("builds a walled grid", () => {
      const grid = Grid.walled(4, 5);
      expect(grid.getRow(0)).toEqual([0, 0, 0, 0, 0]);
      expect(grid.getRow(1)).toEqual([0, 1, 1, 1, 0]);
      expect(grid.getRow(3)).toEqual([0, 0, 0, 0, 0]);
    });

    it("builds from rows and rejects ragged input", () => {
      const grid = Grid.fromRows([
        [CellKind.WALL, CellKind.GOAL],
        [CellKind.BOX, CellKind.PLAYER],
      ]);
      expect(grid.get(1, 1)).toBe(CellKind.PLAYER);
      expect(() => Grid.fromRows([[CellKind.WALL], []])).toThrow(RangeError);
    });
  });

  describe("get/set operations", () => {
    it("sets and gets values correctly", () => {
      const grid = new Grid(5, 5);
      grid.set(2, 3, CellKind.BOX);
      expect(grid.get(2, 3)).toBe(CellKind.BOX);
      expect(grid.getAt({ row: 2, col: 3 })).toBe(CellKind.BOX);
    });

    it("returns WALL for out-of-bounds coordinates", () => {
      const grid = new Grid(5, 5);
      expect(grid.get(-1, 0)).toBe(CellKind.WALL);
      expect(grid.get(0, -1)).toBe(CellKind.WALL);
      expect(grid.get(5, 0)).toBe(CellKind.WALL);
      expect(grid.get(0, 5)).toBe(CellKind.WALL);
    });

    it("throws on out-of-bounds writes", () => {
      const grid = new Grid(5, 5);
      expect(() => grid.set(5, 0, CellKind.WALL)).toThrow(RangeError);
    });
  });

  describe("queries", () => {
    it("finds and counts cells in row-major order", () => {
      const grid = Grid.walled(4, 4);
      grid.set(1, 2, CellKind.GOAL);
      grid.set(2, 1, CellKind.GOAL);

      expect(grid.findAll((kind) => kind === CellKind.GOAL)).toEqual([
        { row: 1, col: 2 },
        { row: 2, col: 1 },
      ]);
      expect(grid.countCells((kind) => kind === CellKind.WALL)).toBe(12);
    });

    it("converts between indices and positions", () => {
      const grid = new Grid(3, 4);
      expect(grid.indexOf(2, 1)).toBe(9);
      expect(grid.positionOf(9)).toEqual({ row: 2, col: 1 });
    });
  });

  describe("clone and equals", () => {
    it("clones independently", () => {
      const grid = Grid.walled(5, 5);
      const copy = grid.clone();
      expect(copy.equals(grid)).toBe(true);

      copy.set(2, 2, CellKind.WALL);
      expect(copy.equals(grid)).toBe(false);
      expect(grid.get(2, 2)).toBe(CellKind.FLOOR);
    });
  });
});
