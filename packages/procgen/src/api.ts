/**
 * Generation API
 *
 * The operations collaborators (renderers, input handlers, automated
 * players) call: generate a level, solve a level or state.
 */

import {
  type Direction,
  type GenerationConfigInput,
  type PuzzleError,
  Result,
  resolveGenerationConfig,
  SeededRandom,
} from "@pushbox/contracts";
import type { Grid } from "./core/grid/grid";
import type { ReadonlyGrid } from "./core/grid/types";
import { parseLevel, serializeLevel } from "./core/level/codec";
import { type GameState, stateFromGrid, stateToGrid } from "./core/state/game-state";
import { selectFallback } from "./fallback/bank";
import {
  type AttemptRecord,
  createReversePlayGenerator,
} from "./generators/reverse-play/generator";
import { createTraceCollector } from "./pipeline/trace";
import type { TraceEvent } from "./pipeline/types";
import { createSeed, createSeedFromString, randomSeed } from "./seed";
import { type SolveOptions, type SolveResult, solve } from "./solver/bfs";

const generator = createReversePlayGenerator();

/** Mixed into the primary seed for the fallback stream */
const FALLBACK_SEED_SALT = 0x5bd1e995;

/**
 * Generation options
 */
export interface GenerateOptions {
  /** Numeric seed, or a string hashed into one. Random when omitted */
  readonly seed?: number | string;
  /** Record trace events. Default: false */
  readonly trace?: boolean;
  /** `fallbackIndex` of the previous level, so the bank does not repeat it */
  readonly previousFallback?: number | null;
}

export type LevelSource = "generated" | "fallback" | "emergency";

/**
 * A playable level with a solution that solves it.
 */
export interface GeneratedLevel {
  readonly state: GameState;
  readonly grid: Grid;
  /** The level in text notation */
  readonly text: string;
  /** Shortest solution found by the solver */
  readonly solution: Direction[];
  /**
   * Moves recorded during reverse play, in forward order. For bank
   * levels this is the known solution.
   */
  readonly playback: Direction[];
  readonly seed: number;
  readonly source: LevelSource;
  readonly attempts: readonly AttemptRecord[];
  /** Bank index when `source` is "fallback", otherwise null */
  readonly fallbackIndex: number | null;
  /** Trace events, empty unless tracing was enabled */
  readonly events: readonly TraceEvent[];
  readonly durationMs: number;
}

function resolveSeedOption(seed: number | string | undefined): number {
  if (seed === undefined) return randomSeed();
  return typeof seed === "string" ? createSeedFromString(seed) : createSeed(seed);
}

/**
 * Generate a solvable level.
 *
 * Generation itself never fails: when no attempt succeeds a bank level
 * is returned instead. Input checking is not covered by that: an invalid
 * configuration or seed throws a `PuzzleError` (`CONFIG_INVALID`,
 * `SEED_INVALID`) before generation starts. Validate untrusted input
 * first with `resolveGenerationConfig` and `resolveSeed`, which return a
 * `Result`.
 *
 * @example
 * ```typescript
 * const level = generateLevel({ boxes: [2, 2] }, { seed: "daily-42" });
 * console.log(level.text);
 * ```
 */
export function generateLevel(
  config: GenerationConfigInput = {},
  options: GenerateOptions = {},
): GeneratedLevel {
  const startTime = performance.now();
  const resolved = resolveGenerationConfig(config).getOrThrow();
  const seed = resolveSeedOption(options.seed);
  const trace = createTraceCollector(options.trace ?? false);

  const outcome = generator.generate(resolved, seed, trace);
  if (outcome.success) {
    const grid = stateToGrid(outcome.state);
    return {
      state: outcome.state,
      grid,
      text: serializeLevel(grid),
      solution: outcome.solution,
      playback: outcome.playback,
      seed,
      source: "generated",
      attempts: outcome.attempts,
      fallbackIndex: null,
      events: trace.getEvents(),
      durationMs: performance.now() - startTime,
    };
  }

  const fallback = selectFallback({
    rng: new SeededRandom((seed ^ FALLBACK_SEED_SALT) >>> 0),
    previous: options.previousFallback ?? undefined,
    solverIterations: resolved.solverIterations,
    trace,
  });

  return {
    state: fallback.state,
    grid: fallback.grid,
    text: serializeLevel(fallback.grid),
    solution: fallback.solution,
    playback: [...fallback.solution],
    seed,
    source: fallback.source,
    attempts: outcome.attempts,
    fallbackIndex: fallback.source === "fallback" ? fallback.index : null,
    events: trace.getEvents(),
    durationMs: performance.now() - startTime,
  };
}

/**
 * Level text, a grid or a state.
 */
export type LevelInput = string | ReadonlyGrid | GameState;

export function toState(level: LevelInput): Result<GameState, PuzzleError> {
  if (typeof level === "string") {
    return parseLevel(level).flatMap((grid) => stateFromGrid(grid));
  }
  if ("layout" in level) return Result.ok(level);
  return stateFromGrid(level);
}

/**
 * Solve a level or a live state. Malformed input is an error value;
 * a search that finds nothing is a `found: false` result.
 */
export function solveLevel(
  level: LevelInput,
  options: SolveOptions = {},
): Result<SolveResult, PuzzleError> {
  return toState(level).map((state) => solve(state, options));
}
