/**
 * Generation tracing.
 */

export * from "./trace";
export * from "./types";
