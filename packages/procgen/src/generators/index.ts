/**
 * Generators module - level generation algorithms.
 */

export * from "./reverse-play";
