/**
 * Cave Automaton Constants
 */

// =============================================================================
// SMOOTHING RULES
// =============================================================================

/** A cell with at least this many walls within distance 1 becomes wall */
export const WALL_THRESHOLD_NEAR = 5;

/** During the big-area phase, a cell with at most this many walls within distance 2 becomes wall */
export const WALL_THRESHOLD_FAR = 2;

/** Neighbourhood radii for the two wall counts */
export const NEAR_RADIUS = 1;
export const FAR_RADIUS = 2;

// =============================================================================
// CONNECTIVITY
// =============================================================================

/**
 * Upper bound on flood/merge rounds. One round always suffices because
 * tunnels join open anchor tiles; the bound keeps degenerate grids finite.
 */
export const MAX_CONNECT_ROUNDS = 8;
