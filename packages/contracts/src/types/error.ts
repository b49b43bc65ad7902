/**
 * Error codes for puzzle parsing, configuration and generation.
 */
export type PuzzleErrorCode =
  | "CONFIG_INVALID"
  | "SEED_INVALID"
  | "LEVEL_PARSE_FAILED"
  | "LEVEL_PLAYER_MISSING"
  | "LEVEL_MULTIPLE_PLAYERS"
  | "FALLBACK_CORRUPT";

/**
 * Unified error type for the puzzle engine.
 *
 * Search exhaustion is not an error (the solver reports it as a value);
 * this type covers malformed input and internal consistency failures.
 *
 * @example
 * ```typescript
 * const error = new PuzzleError(
 *   "LEVEL_MULTIPLE_PLAYERS",
 *   "Level has 2 player markers",
 *   { players: 2 },
 * );
 * ```
 */
export class PuzzleError extends Error {
  override readonly name = "PuzzleError";

  constructor(
    public readonly code: PuzzleErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PuzzleError);
    }
  }

  static configInvalid(
    message: string,
    details?: Record<string, unknown>,
  ): PuzzleError {
    return new PuzzleError("CONFIG_INVALID", message, details);
  }

  static levelParseFailed(
    message: string,
    details?: Record<string, unknown>,
  ): PuzzleError {
    return new PuzzleError("LEVEL_PARSE_FAILED", message, details);
  }

  /**
   * Check if an unknown error is a PuzzleError.
   */
  static isPuzzleError(error: unknown): error is PuzzleError {
    return error instanceof PuzzleError;
  }

  toJSON(): {
    name: string;
    code: PuzzleErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
