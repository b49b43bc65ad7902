/**
 * Play-time state of one level: moves, undo, reset and an attached
 * solution that follows the player.
 */

import type { Direction } from "@pushbox/contracts";
import { type GameState, isStateSolved } from "../core/state/game-state";
import { applyMove, type MoveOutcome } from "../core/state/moves";
import { DEFAULT_SOLVER_ITERATIONS, solve } from "../solver/bfs";

export const DEFAULT_HISTORY_LIMIT = 100;

export interface SessionOptions {
  /** Known solution from the initial state */
  readonly solution?: readonly Direction[];
  /** Undo entries kept; the oldest are dropped first */
  readonly historyLimit?: number;
  /** Dequeue budget when the solution has to be recomputed */
  readonly solverIterations?: number;
}

/**
 * @example
 * ```typescript
 * const level = generateLevel();
 * const session = new PuzzleSession(level.state, { solution: level.solution });
 * session.move(session.hint() ?? "U");
 * ```
 */
export class PuzzleSession {
  private readonly initial: GameState;
  private readonly initialSolution: readonly Direction[] | null;
  private readonly historyLimit: number;
  private readonly solverIterations: number;

  private current: GameState;
  private history: GameState[] = [];
  /** Remaining moves of the attached solution, null once the player left it */
  private remaining: Direction[] | null;
  private moves = 0;

  constructor(initial: GameState, options: SessionOptions = {}) {
    this.initial = initial;
    this.current = initial;
    this.initialSolution = options.solution ?? null;
    this.remaining = options.solution ? [...options.solution] : null;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.solverIterations = options.solverIterations ?? DEFAULT_SOLVER_ITERATIONS;
  }

  get state(): GameState {
    return this.current;
  }

  /** Moves made since the start or the last reset, net of undos */
  get moveCount(): number {
    return this.moves;
  }

  get canUndo(): boolean {
    return this.history.length > 0;
  }

  get historySize(): number {
    return this.history.length;
  }

  /**
   * Remaining moves of the attached solution, or null when the player
   * has departed from it and none has been recomputed.
   */
  get solution(): readonly Direction[] | null {
    return this.remaining ? [...this.remaining] : null;
  }

  isSolved(): boolean {
    return isStateSolved(this.current);
  }

  move(direction: Direction): MoveOutcome {
    const outcome = applyMove(this.current, direction);
    if (!outcome.moved) return outcome;

    this.history.push(this.current);
    if (this.history.length > this.historyLimit) this.history.shift();
    this.current = outcome.state;
    this.moves++;

    if (this.remaining && this.remaining[0] === direction) {
      this.remaining.shift();
    } else {
      this.remaining = null;
    }

    return outcome;
  }

  /**
   * Step back one move. Returns false when there is nothing to undo.
   */
  undo(): boolean {
    const previous = this.history.pop();
    if (!previous) return false;
    this.current = previous;
    this.moves--;
    this.remaining = null;
    return true;
  }

  reset(): void {
    this.current = this.initial;
    this.history = [];
    this.moves = 0;
    this.remaining = this.initialSolution ? [...this.initialSolution] : null;
  }

  /**
   * Solve from the current state and attach the result. Returns null
   * when no solution was found.
   */
  regenerateSolution(): readonly Direction[] | null {
    const result = solve(this.current, { maxIterations: this.solverIterations });
    this.remaining = result.found ? result.moves : null;
    return this.remaining ? [...this.remaining] : null;
  }

  /**
   * Next move of the attached solution, recomputing it if the player
   * departed from it. Null when solved or unsolvable.
   */
  hint(): Direction | null {
    if (this.isSolved()) return null;
    const solution = this.remaining ?? this.regenerateSolution();
    return solution?.[0] ?? null;
  }
}
