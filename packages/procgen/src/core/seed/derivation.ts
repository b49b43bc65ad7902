import { SeededRandom } from "@pushbox/contracts";

/**
 * Seeds for the random streams of one generation attempt.
 */
export interface AttemptSeeds {
  /** Complexity, wall carving and goal placement */
  readonly layout: number;
  /** Player start and reverse play */
  readonly play: number;
}

/**
 * Derive the seeds of attempt `attempt` (0-based) from a primary seed.
 *
 * Each attempt can be replayed on its own from `(primary, attempt)`
 * without re-running the attempts before it.
 */
export function deriveAttemptSeeds(primary: number, attempt: number): AttemptSeeds {
  const mixed = (primary ^ Math.imul(attempt + 1, 0x9e3779b9)) >>> 0;
  const rng = new SeededRandom(mixed);
  return {
    layout: rng.nextUint32(),
    play: rng.nextUint32(),
  };
}
