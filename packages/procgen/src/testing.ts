/**
 * Testing utilities for level generation.
 * Kept apart from validation because they depend on the generation API.
 */

import type { Direction, GenerationConfigInput } from "@pushbox/contracts";
import { type GeneratedLevel, generateLevel, toState } from "./api";
import { type GameState, isStateSolved } from "./core/state/game-state";
import { replay } from "./core/state/moves";

// =============================================================================
// FIXTURES
// =============================================================================

/**
 * Build a state from level text, throwing on malformed text.
 *
 * @example
 * ```typescript
 * const state = levelState(["#####", "#@$.#", "#####"]);
 * ```
 */
export function levelState(text: string | readonly string[]): GameState {
  const joined = typeof text === "string" ? text : text.join("\n");
  return toState(joined).getOrThrow();
}

/**
 * True when `moves` take `state` to a solved state without a blocked move.
 */
export function solvesFrom(state: GameState, moves: readonly Direction[]): boolean {
  const played = replay(state, moves);
  return played.blockedAt === undefined && isStateSolved(played.state);
}

// =============================================================================
// DETERMINISM TESTING
// =============================================================================

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly fingerprints: string[],
    public readonly seed: number | string,
  ) {
    super(
      `Non-deterministic generation detected: produced ${fingerprints.length} different levels for seed ${seed}`,
    );
    this.name = "DeterminismViolationError";
  }
}

function fingerprint(level: GeneratedLevel): string {
  return `${level.source}|${level.text}|${level.solution.join("")}`;
}

/**
 * Assert that generation produces the same level and solution for the
 * same seed.
 *
 * @throws {DeterminismViolationError} If runs disagree
 */
export function assertDeterministic(
  config: GenerationConfigInput,
  seed: number | string,
  runs: number = 3,
): void {
  const fingerprints: string[] = [];
  for (let i = 0; i < runs; i++) {
    fingerprints.push(fingerprint(generateLevel(config, { seed })));
  }

  const unique = [...new Set(fingerprints)];
  if (unique.length > 1) {
    throw new DeterminismViolationError(unique, seed);
  }
}
