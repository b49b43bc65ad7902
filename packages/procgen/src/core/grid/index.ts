/**
 * Grid module - level grid storage and flood fill.
 */

export * from "./flood-fill";
export { Grid } from "./grid";
export * from "./types";
