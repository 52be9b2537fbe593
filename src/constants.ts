import { availableParallelism } from "node:os";

// ── Geometry ──

/** Full turn in radians. */
export const TAU = 2 * Math.PI;

/** Quarter turn in radians (latitude of the north pole). */
export const HALF_PI = Math.PI / 2;

/**
 * Slack added before flooring a scaled coordinate to a cell index, so that a
 * value sitting exactly on a cell boundary (after a trig round trip) lands in
 * the cell that starts there rather than the one before it.
 */
export const CELL_EPSILON = 1e-9;

// ── Cube sphere ──

/** Number of faces on a cube-sphere grid. */
export const CUBE_FACE_COUNT = 6;

// ── Parallel traversal ──

/** Default number of partitions a parallel grid operation splits its rows into. */
export const DEFAULT_PARTITIONS = Math.max(1, availableParallelism());

// ── Game of Life ──

/** Live neighbour counts for which a dead cell becomes alive (B3). */
export const LIFE_BIRTH = [3];

/** Live neighbour counts for which a live cell survives (S23). */
export const LIFE_SURVIVAL = [2, 3];
