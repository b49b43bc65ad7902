import type { DeadlockKind } from "../deadlock";

export type ViolationType =
  | "level.player.missing"
  | "level.player.multiple"
  | "level.goals.missing"
  | "level.boxes.missing"
  | "level.boxes.count-mismatch"
  | "level.solved"
  | "level.goals.preplaced"
  | `level.deadlock.${DeadlockKind}`;

/**
 * A rule a level breaks. Only `error` violations reject the level.
 */
export interface Violation {
  readonly type: ViolationType;
  readonly message: string;
  readonly severity: "error" | "warning";
}

export type LevelValidationResult =
  | { readonly success: true; readonly violations: readonly Violation[] }
  | { readonly success: false; readonly violations: readonly Violation[] };

export function hasErrorViolations(violations: readonly Violation[]): boolean {
  return violations.some((violation) => violation.severity === "error");
}
