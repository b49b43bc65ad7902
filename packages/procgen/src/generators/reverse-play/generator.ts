/**
 * Reverse-Play Level Generator
 *
 * Runs the attempt loop: layout, connectivity, goals, reverse play,
 * forward verification and validity, retried until one attempt passes
 * or the attempt budget is spent.
 */

import {
  type Direction,
  type GenerationConfig,
  SeededRandom,
} from "@pushbox/contracts";
import type { Dimensions } from "../../core/geometry/types";
import { isConnected } from "../../core/grid/flood-fill";
import type { GameState } from "../../core/state/game-state";
import { type AttemptSeeds, deriveAttemptSeeds } from "../../core/seed/derivation";
import type { TraceCollector } from "../../pipeline/types";
import { buildLayout, placeGoals } from "./layout";
import { type ReversePlayFailureReason, reversePlay } from "./reverse-play";

export type AttemptOutcome = "generated" | "disconnected" | ReversePlayFailureReason;

/**
 * Summary of one generation attempt.
 */
export interface AttemptRecord {
  readonly attempt: number;
  readonly seeds: AttemptSeeds;
  readonly complexity: number;
  readonly outcome: AttemptOutcome;
}

export interface GenerationSuccess {
  readonly success: true;
  readonly state: GameState;
  readonly solution: Direction[];
  readonly playback: Direction[];
  readonly dimensions: Dimensions;
  readonly boxes: number;
  readonly attempts: readonly AttemptRecord[];
}

export interface GenerationFailure {
  readonly success: false;
  readonly dimensions: Dimensions;
  readonly boxes: number;
  readonly attempts: readonly AttemptRecord[];
}

export type GenerationOutcome = GenerationSuccess | GenerationFailure;

/**
 * Reverse-play generator. Dimensions and box count are drawn once per
 * call from the primary seed; every attempt then draws its own
 * complexity and runs on seeds derived from `(seed, attempt)`.
 */
export class ReversePlayGenerator {
  readonly id = "reverse-play";
  readonly name = "Reverse Play";
  readonly description =
    "Builds levels by pulling boxes away from a solved configuration";

  generate(
    config: GenerationConfig,
    seed: number,
    trace: TraceCollector,
  ): GenerationOutcome {
    const rng = new SeededRandom(seed);
    const dimensions: Dimensions = {
      rows: rng.range(config.rows[0], config.rows[1]),
      cols: rng.range(config.cols[0], config.cols[1]),
    };
    const boxes = rng.range(config.boxes[0], config.boxes[1]);

    trace.decision(
      "layout",
      "Level size and box count?",
      [config.rows, config.cols, config.boxes],
      { ...dimensions, boxes },
      `${dimensions.rows}x${dimensions.cols} with ${boxes} boxes`,
    );

    const attempts: AttemptRecord[] = [];
    for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
      const seeds = deriveAttemptSeeds(seed, attempt);
      const layoutRng = new SeededRandom(seeds.layout);
      const complexity = layoutRng.uniform(config.complexity[0], config.complexity[1]);

      const started = performance.now();
      trace.start("layout");
      const grid = buildLayout({ ...dimensions, complexity }, layoutRng, trace);
      const connected = isConnected(grid);
      if (connected) placeGoals(grid, boxes, layoutRng);
      trace.end("layout", performance.now() - started);

      if (!connected) {
        attempts.push({ attempt, seeds, complexity, outcome: "disconnected" });
        continue;
      }

      const playStarted = performance.now();
      trace.start("reverse-play");
      const result = reversePlay(grid, boxes, new SeededRandom(seeds.play), {
        steps: config.steps,
        minSteps: config.minSteps,
        solverIterations: config.solverIterations,
        trace,
      });
      trace.end("reverse-play", performance.now() - playStarted);

      if (!result.success) {
        attempts.push({ attempt, seeds, complexity, outcome: result.reason });
        continue;
      }

      attempts.push({ attempt, seeds, complexity, outcome: "generated" });
      return {
        success: true,
        state: result.state,
        solution: result.solution,
        playback: result.playback,
        dimensions,
        boxes,
        attempts,
      };
    }

    trace.warning("reverse-play", "Attempt budget exhausted", {
      attempts: attempts.length,
    });
    return { success: false, dimensions, boxes, attempts };
  }
}

export function createReversePlayGenerator(): ReversePlayGenerator {
  return new ReversePlayGenerator();
}
