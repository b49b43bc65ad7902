/**
 * Core module - grid, state and level primitives.
 */

export * from "./data-structures";
export * from "./geometry";
export * from "./grid";
export * from "./level";
export * from "./seed";
export * from "./state";
