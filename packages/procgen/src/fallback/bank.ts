/**
 * Fallback bank: hand-authored levels dispensed when generation gives up.
 */

import {
  type Direction,
  PuzzleError,
  Result,
  type SeededRandom,
} from "@pushbox/contracts";
import type { Grid } from "../core/grid/grid";
import { parseLevel } from "../core/level/codec";
import { type GameState, isStateSolved, stateFromGrid } from "../core/state/game-state";
import { replay } from "../core/state/moves";
import { createTraceCollector } from "../pipeline/trace";
import type { TraceCollector } from "../pipeline/types";
import { DEFAULT_SOLVER_ITERATIONS, solve } from "../solver/bfs";
import { EMERGENCY_LEVEL, FALLBACK_LEVELS, type FallbackLevel } from "./levels";

export interface VerifiedFallback {
  readonly grid: Grid;
  readonly state: GameState;
}

export interface FallbackRejection {
  readonly index: number;
  readonly name: string;
  readonly error: PuzzleError;
}

export interface FallbackSelection {
  readonly source: "fallback" | "emergency";
  /** Bank index of the chosen level, -1 for the emergency level */
  readonly index: number;
  readonly level: FallbackLevel;
  readonly grid: Grid;
  readonly state: GameState;
  readonly solution: Direction[];
  /** Bank entries that failed re-verification */
  readonly rejected: readonly FallbackRejection[];
}

export interface FallbackOptions {
  readonly rng: SeededRandom;
  /** Index returned by the previous selection; it is not handed out again */
  readonly previous?: number;
  readonly solverIterations?: number;
  readonly trace?: TraceCollector;
  /** Bank to draw from, the built-in levels by default */
  readonly levels?: readonly FallbackLevel[];
}

function corrupt(level: FallbackLevel, message: string, details?: Record<string, unknown>) {
  return new PuzzleError("FALLBACK_CORRUPT", `Fallback '${level.name}': ${message}`, details);
}

/**
 * Re-verify a bank entry: it must parse, the solver must find a
 * solution, and its known solution must replay to a solved state.
 */
export function verifyFallback(
  level: FallbackLevel,
  solverIterations: number = DEFAULT_SOLVER_ITERATIONS,
): Result<VerifiedFallback, PuzzleError> {
  return parseLevel(level.text)
    .flatMap((grid) =>
      stateFromGrid(grid).map((state): VerifiedFallback => ({ grid, state })),
    )
    .mapErr((error) => corrupt(level, error.message, { code: error.code }))
    .flatMap((verified): Result<VerifiedFallback, PuzzleError> => {
      const result = solve(verified.state, { maxIterations: solverIterations });
      if (!result.found) {
        return Result.err(corrupt(level, "no solution found", { reason: result.reason }));
      }
      const played = replay(verified.state, level.solution);
      if (played.blockedAt !== undefined || !isStateSolved(played.state)) {
        return Result.err(
          corrupt(level, "known solution does not solve the level", {
            blockedAt: played.blockedAt,
          }),
        );
      }
      return Result.ok(verified);
    });
}

function emergency(rejected: readonly FallbackRejection[]): FallbackSelection {
  const grid = parseLevel(EMERGENCY_LEVEL.text).getOrThrow();
  return {
    source: "emergency",
    index: -1,
    level: EMERGENCY_LEVEL,
    grid,
    state: stateFromGrid(grid).getOrThrow(),
    solution: [...EMERGENCY_LEVEL.solution],
    rejected,
  };
}

/**
 * Pick a verified bank entry at random, avoiding `previous`. Entries
 * that fail verification are reported and skipped; when none passes the
 * emergency level is returned.
 *
 * @example
 * ```typescript
 * const first = selectFallback({ rng });
 * const second = selectFallback({ rng, previous: first.index });
 * ```
 */
export function selectFallback(options: FallbackOptions): FallbackSelection {
  const levels = options.levels ?? FALLBACK_LEVELS;
  const trace = options.trace ?? createTraceCollector(false);
  const solverIterations = options.solverIterations ?? DEFAULT_SOLVER_ITERATIONS;

  const verified: Array<{ index: number; level: FallbackLevel } & VerifiedFallback> = [];
  const rejected: FallbackRejection[] = [];

  levels.forEach((level, index) => {
    verifyFallback(level, solverIterations).match(
      (entry) => {
        verified.push({ index, level, ...entry });
      },
      (error) => {
        rejected.push({ index, name: level.name, error });
        trace.warning("fallback", error.message, { index });
      },
    );
  });

  const candidates = verified.filter((entry) => entry.index !== options.previous);
  const chosen = options.rng.choice(candidates) ?? verified[0];
  if (!chosen) {
    trace.warning("fallback", "Every fallback failed verification, using the emergency level");
    return emergency(rejected);
  }

  trace.decision(
    "fallback",
    "Which fallback level?",
    candidates.map((entry) => entry.level.name),
    chosen.level.name,
    options.previous === undefined
      ? "Random verified entry"
      : `Random verified entry other than #${options.previous}`,
  );

  return {
    source: "fallback",
    index: chosen.index,
    level: chosen.level,
    grid: chosen.grid,
    state: chosen.state,
    solution: [...chosen.level.solution],
    rejected,
  };
}
