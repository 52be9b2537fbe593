/** A position in 3D space, Y-up: Y = north pole, X/Z = equatorial plane. */
export type Vec3 = [number, number, number];

/** The four moves every grid point supports. */
export type Direction = "up" | "down" | "left" | "right";

/**
 * An addressable cell on a wrapped surface.
 *
 * Two points are equal when they name the same cell of the same grid shape.
 * Moving repeatedly in one direction along a closed loop of the surface
 * returns to the starting point.
 */
export interface GridPoint<P extends GridPoint<P>> {
  /** The cell immediately above this one. */
  up(): P;
  /** The cell immediately below this one. */
  down(): P;
  /** The cell immediately to the left of this one. */
  left(): P;
  /** The cell immediately to the right of this one. */
  right(): P;

  /** Position of the cell on a sphere of radius `scale`. */
  position(scale: number): Vec3;

  equals(other: P): boolean;

  /**
   * Identity string, unique among the points of one grid and usable as a Set
   * or Map key there. It leaves out the grid size, so points of grids of
   * different sizes can share a key; compare those with `equals`.
   */
  key(): string;
}

/** A grid point on a sphere, convertible to geographic coordinates. */
export interface SpherePoint<P extends SpherePoint<P>> extends GridPoint<P> {
  /** Latitude in radians, 0 at the equator, positive to the north. */
  latitude(): number;

  /** Longitude in radians in [0, 2π). */
  longitude(): number;

  /** `[longitude, latitude]`, i.e. x = longitude and y = latitude. */
  sphereCoordinates(): [number, number];
}

/**
 * The shape of a surface: which points exist and where each one is stored.
 *
 * Storage is a list of dense row-major sheets (one for a rectangle, one per
 * face for a cube). Implemented once per topology; grids share no state with
 * it beyond these lookups.
 */
export interface Topology<P extends GridPoint<P>> {
  /** Number of dense sheets backing a grid of this topology. */
  readonly sheetCount: number;
  readonly sheetWidth: number;
  readonly sheetHeight: number;
  /** Total number of cells, `sheetCount · sheetWidth · sheetHeight`. */
  readonly cellCount: number;

  /** The point stored at column `x`, row `y` of `sheet`. */
  pointAt(sheet: number, x: number, y: number): P;

  /** Sheet index holding `point`. */
  sheetOf(point: P): number;

  /** Row-major offset of `point` inside its sheet. */
  offsetOf(point: P): number;

  /** Whether `point` belongs to a grid of this topology. */
  contains(point: P): boolean;

  /** Whether `other` describes the same shape and size. */
  sameAs(other: Topology<P>): boolean;

  /** The cell containing the given geographic coordinates (radians). */
  fromGeographic(latitude: number, longitude: number): P;

  /** Short human-readable description, used in error messages. */
  describe(): string;
}

/** Cell function of `from_fn`-style constructors and updates. */
export type PointFn<P, T> = (point: P) => T;

/** Von Neumann neighbourhood: current, up, down, left, right. */
export type NeighboursFn<U, T> = (current: U, up: U, down: U, left: U, right: U) => T;

/**
 * Moore neighbourhood, row by row: upLeft, up, upRight, left, current, right,
 * downLeft, down, downRight.
 */
export type DiagonalNeighboursFn<U, T> = (
  upLeft: U, up: U, upRight: U,
  left: U, current: U, right: U,
  downLeft: U, down: U, downRight: U,
) => T;

/** Options of the parallel (`…Par`) grid operations. */
export interface ParallelOptions {
  /** Number of row partitions to schedule. Defaults to the available parallelism. */
  partitions?: number;
}
