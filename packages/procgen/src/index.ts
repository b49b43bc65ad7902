/**
 * Box-pushing puzzle generation and verification.
 *
 * @example
 * ```typescript
 * import { applyMove, generateLevel, isStateSolved } from "@pushbox/procgen";
 *
 * const level = generateLevel({ boxes: [2, 3] }, { seed: 12345 });
 * let state = level.state;
 * for (const move of level.solution) {
 *   state = applyMove(state, move).state;
 * }
 * isStateSolved(state); // true
 * ```
 */

// Core modules
export * from "./core";
// Deadlock classifier
export * from "./deadlock";
// Fallback bank
export * from "./fallback";
// Generators
export * from "./generators";
// Tracing
export * from "./pipeline";
// Play sessions
export * from "./session";
// Solver
export * from "./solver";
// Validation
export * from "./validation";

// High-level API
export * from "./api";
export * from "./seed";
// Testing utilities
export * from "./testing";
