/**
 * Reverse-Play Generator Constants
 */

// =============================================================================
// LAYOUT
// =============================================================================

/** Grids with this many rows or columns or fewer get no internal walls */
export const MIN_CARVABLE_DIMENSION = 4;

// =============================================================================
// REVERSE PLAY
// =============================================================================

/** Pull/step attempts allowed per targeted step */
export const ATTEMPTS_PER_STEP = 10;
