import type { ReadonlyGrid } from "../core/grid/types";
import {
  countBoxesOnGoals,
  type GameState,
  stateFromGrid,
} from "../core/state/game-state";
import { classifyDeadlock } from "../deadlock";
import {
  hasErrorViolations,
  type LevelValidationResult,
  type Violation,
} from "./result-types";

function toResult(violations: readonly Violation[]): LevelValidationResult {
  return hasErrorViolations(violations)
    ? { success: false, violations }
    : { success: true, violations };
}

/**
 * Validate a playable state.
 *
 * Checks:
 * - Boxes and goals exist, one box per goal
 * - The level is not already solved
 * - At most one box starts on a goal
 * - No box is deadlocked
 */
export function validateState(state: GameState): LevelValidationResult {
  const violations: Violation[] = [];
  const boxCount = state.boxes.length;
  const goalCount = state.layout.goals.length;

  if (goalCount === 0) {
    violations.push({
      type: "level.goals.missing",
      message: "Level has no goals",
      severity: "error",
    });
  }
  if (boxCount === 0) {
    violations.push({
      type: "level.boxes.missing",
      message: "Level has no boxes",
      severity: "error",
    });
  }
  if (boxCount !== goalCount) {
    violations.push({
      type: "level.boxes.count-mismatch",
      message: `Level has ${boxCount} boxes for ${goalCount} goals`,
      severity: "error",
    });
  }

  const onGoals = countBoxesOnGoals(state);
  if (boxCount > 0 && onGoals === boxCount) {
    violations.push({
      type: "level.solved",
      message: "Every box already stands on a goal",
      severity: "error",
    });
  } else if (onGoals > 1) {
    violations.push({
      type: "level.goals.preplaced",
      message: `${onGoals} boxes start on goals (at most 1 allowed)`,
      severity: "error",
    });
  } else if (onGoals === 1) {
    violations.push({
      type: "level.goals.preplaced",
      message: "One box starts on a goal",
      severity: "warning",
    });
  }

  const deadlock = classifyDeadlock(state);
  if (deadlock) {
    violations.push({
      type: `level.deadlock.${deadlock.kind}`,
      message: `Box at (${deadlock.box.row}, ${deadlock.box.col}) is in a ${deadlock.kind} deadlock`,
      severity: "error",
    });
  }

  return toResult(violations);
}

/**
 * Validate a level grid. A missing or duplicated player is reported as a
 * violation rather than an error value.
 */
export function validateLevel(grid: ReadonlyGrid): LevelValidationResult {
  return stateFromGrid(grid).match(
    (state) => validateState(state),
    (error) =>
      toResult([
        {
          type:
            error.code === "LEVEL_MULTIPLE_PLAYERS"
              ? "level.player.multiple"
              : "level.player.missing",
          message: error.message,
          severity: "error",
        },
      ]),
  );
}

export function isValidLevel(level: ReadonlyGrid | GameState): boolean {
  return "layout" in level
    ? validateState(level).success
    : validateLevel(level).success;
}
