/**
 * Breadth-first solver over (player, box set) states.
 *
 * The first solution found is shortest in moves. Successors are tried
 * in U, D, L, R order, so the result for a given state never varies.
 */

import { DIRECTION_ORDER, type Direction } from "@pushbox/contracts";
import { FastQueue } from "../core/data-structures/fast-queue";
import { type GameState, isStateSolved, stateKey } from "../core/state/game-state";
import { applyMove } from "../core/state/moves";
import { hasDeadlock } from "../deadlock";

export const DEFAULT_SOLVER_ITERATIONS = 100_000;

export interface SolveOptions {
  /** Maximum number of dequeued states before giving up */
  readonly maxIterations?: number;
}

interface SearchStats {
  /** States dequeued */
  readonly iterations: number;
  /** Distinct states marked visited */
  readonly explored: number;
}

export interface SolveSuccess extends SearchStats {
  readonly found: true;
  readonly moves: Direction[];
}

/**
 * Why no solution was returned:
 * - `exhausted`: every reachable non-deadlocked state was expanded
 * - `budget`: the dequeue budget ran out first
 * - `invalid`: the state has no boxes or no goals
 */
export type NotFoundReason = "exhausted" | "budget" | "invalid";

export interface SolveFailure extends SearchStats {
  readonly found: false;
  readonly reason: NotFoundReason;
}

export type SolveResult = SolveSuccess | SolveFailure;

interface SearchNode {
  readonly state: GameState;
  readonly parent: SearchNode | null;
  readonly move: Direction | null;
}

function pathTo(node: SearchNode): Direction[] {
  const moves: Direction[] = [];
  let current: SearchNode | null = node;
  while (current?.move) {
    moves.push(current.move);
    current = current.parent;
  }
  return moves.reverse();
}

/**
 * Find a shortest move sequence from `initial` to a solved state.
 *
 * Successors that are deadlocked are dropped before they are queued.
 *
 * @example
 * ```typescript
 * const result = solve(state);
 * if (result.found) console.log(result.moves.join(""));
 * ```
 */
export function solve(initial: GameState, options: SolveOptions = {}): SolveResult {
  const maxIterations = options.maxIterations ?? DEFAULT_SOLVER_ITERATIONS;

  if (isStateSolved(initial)) {
    return { found: true, moves: [], iterations: 0, explored: 1 };
  }
  if (initial.boxes.length === 0 || initial.layout.goals.length === 0) {
    return { found: false, reason: "invalid", iterations: 0, explored: 0 };
  }

  const visited = new Set<string>([stateKey(initial)]);
  const queue = new FastQueue<SearchNode>();
  queue.enqueue({ state: initial, parent: null, move: null });
  let iterations = 0;

  while (!queue.isEmpty) {
    if (iterations >= maxIterations) {
      return { found: false, reason: "budget", iterations, explored: visited.size };
    }

    const node = queue.dequeue();
    if (!node) break;
    iterations++;

    for (const direction of DIRECTION_ORDER) {
      const outcome = applyMove(node.state, direction);
      if (!outcome.moved) continue;

      const next = outcome.state;
      const key = stateKey(next);
      if (visited.has(key)) continue;

      const child: SearchNode = { state: next, parent: node, move: direction };
      if (isStateSolved(next)) {
        return {
          found: true,
          moves: pathTo(child),
          iterations,
          explored: visited.size,
        };
      }
      if (hasDeadlock(next)) continue;

      visited.add(key);
      queue.enqueue(child);
    }
  }

  return { found: false, reason: "exhausted", iterations, explored: visited.size };
}

/**
 * First move of a shortest solution from a live state, or null when
 * the state is already solved or no solution was found.
 */
export function nextMove(state: GameState, options: SolveOptions = {}): Direction | null {
  const result = solve(state, options);
  if (!result.found) return null;
  return result.moves[0] ?? null;
}
