/**
 * Plain-text level notation.
 *
 * | Char | Cell           |
 * |------|----------------|
 * | `#`  | wall           |
 * | ` `  | floor          |
 * | `.`  | goal           |
 * | `$`  | box            |
 * | `*`  | box on goal    |
 * | `@`  | player         |
 * | `+`  | player on goal |
 */

import { PuzzleError, Result } from "@pushbox/contracts";
import { Grid } from "../grid/grid";
import { CellKind, type ReadonlyGrid } from "../grid/types";

const CHAR_TO_KIND: Readonly<Record<string, CellKind>> = {
  "#": CellKind.WALL,
  " ": CellKind.FLOOR,
  ".": CellKind.GOAL,
  $: CellKind.BOX,
  "*": CellKind.BOX_ON_GOAL,
  "@": CellKind.PLAYER,
  "+": CellKind.PLAYER_ON_GOAL,
};

const KIND_TO_CHAR: Readonly<Record<CellKind, string>> = {
  [CellKind.WALL]: "#",
  [CellKind.FLOOR]: " ",
  [CellKind.GOAL]: ".",
  [CellKind.BOX]: "$",
  [CellKind.BOX_ON_GOAL]: "*",
  [CellKind.PLAYER]: "@",
  [CellKind.PLAYER_ON_GOAL]: "+",
};

/**
 * Parse level text into a grid.
 *
 * Carriage returns and trailing blank lines are ignored. Rows shorter
 * than the widest row are padded with walls.
 */
export function parseLevel(text: string): Result<Grid, PuzzleError> {
  const lines = text.replace(/\r/g, "").split("\n");
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") {
    lines.pop();
  }

  if (lines.length === 0) {
    return Result.err(PuzzleError.levelParseFailed("Level text is empty"));
  }

  const width = Math.max(...lines.map((line) => line.length));
  if (width === 0) {
    return Result.err(PuzzleError.levelParseFailed("Level text is empty"));
  }

  const grid = new Grid(lines.length, width, CellKind.WALL);
  for (let row = 0; row < lines.length; row++) {
    const line = lines[row] ?? "";
    for (let col = 0; col < line.length; col++) {
      const char = line.charAt(col);
      const kind = CHAR_TO_KIND[char];
      if (kind === undefined) {
        return Result.err(
          PuzzleError.levelParseFailed(
            `Unknown level character '${char}' at ${row}:${col}`,
            { row, col, char },
          ),
        );
      }
      grid.set(row, col, kind);
    }
  }

  return Result.ok(grid);
}

export function serializeLevel(grid: ReadonlyGrid): string {
  const lines: string[] = [];
  for (let row = 0; row < grid.rows; row++) {
    lines.push(grid.getRow(row).map((kind) => KIND_TO_CHAR[kind]).join(""));
  }
  return lines.join("\n");
}
