import { HALF_PI, TAU, CELL_EPSILON } from "../constants";
import type { PointFn, SpherePoint, Topology, Vec3, ParallelOptions } from "../types/grid-types";
import { assertGridSize, cellAt, wrapIndex } from "../utils/grid-utils";
import { foldGeographic, latLonToPosition } from "../utils/sphere-math";
import { SurfaceGrid } from "./surface-grid";

/**
 * A cell on an equirectangular sphere grid.
 *
 * Columns are meridians (x = 0 at longitude 0), rows are parallels (row 0 is
 * the north pole). Left/right wrap around the equator. Up/down follow one
 * great circle over both poles: on the western half (x < W/2) `up` heads
 * north, on the eastern half it heads south, and crossing a pole re-enters
 * the same pole row at the antipodal column x + W/2. This keeps `up` and
 * `down` exact inverses everywhere.
 */
export class RectangleSpherePoint implements SpherePoint<RectangleSpherePoint> {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  /** Coordinates wrap modulo the grid size. */
  constructor(x: number, y: number, width: number, height: number) {
    this.x = wrapIndex(Math.trunc(x), width);
    this.y = wrapIndex(Math.trunc(y), height);
    this.width = width;
    this.height = height;
  }

  static fromGeographic(latitude: number, longitude: number, width: number, height: number): RectangleSpherePoint {
    const [lat, lon] = foldGeographic(latitude, longitude);
    const x = wrapIndex(Math.floor(lon / TAU * width + CELL_EPSILON), width);
    const y = cellAt((HALF_PI - lat) / Math.PI, height);
    return new RectangleSpherePoint(x, y, width, height);
  }

  up(): RectangleSpherePoint {
    return this.isWestern() ? this.towardNorthPole() : this.towardSouthPole();
  }

  down(): RectangleSpherePoint {
    return this.isWestern() ? this.towardSouthPole() : this.towardNorthPole();
  }

  left(): RectangleSpherePoint {
    return this.at(this.x - 1, this.y);
  }

  right(): RectangleSpherePoint {
    return this.at(this.x + 1, this.y);
  }

  position(scale: number): Vec3 {
    return latLonToPosition(this.latitude(), this.longitude(), scale);
  }

  latitude(): number {
    return HALF_PI - this.y / this.height * Math.PI;
  }

  longitude(): number {
    return this.x / this.width * TAU;
  }

  sphereCoordinates(): [number, number] {
    return [this.longitude(), this.latitude()];
  }

  equals(other: RectangleSpherePoint): boolean {
    return this.x === other.x && this.y === other.y
      && this.width === other.width && this.height === other.height;
  }

  key(): string {
    return `(${this.x},${this.y})`;
  }

  private isWestern(): boolean {
    return this.x < this.width / 2;
  }

  private towardNorthPole(): RectangleSpherePoint {
    if (this.y === 0) return this.at(this.x + this.width / 2, 0);
    return this.at(this.x, this.y - 1);
  }

  private towardSouthPole(): RectangleSpherePoint {
    if (this.y === this.height - 1) return this.at(this.x + this.width / 2, this.y);
    return this.at(this.x, this.y + 1);
  }

  private at(x: number, y: number): RectangleSpherePoint {
    return new RectangleSpherePoint(x, y, this.width, this.height);
  }
}

/**
 * A `width × height` equirectangular grid.
 *
 * `width` must be even. This is stricter than pole crossing itself needs: an
 * odd width could cross to column `x + ⌊W/2⌋`, but then a column and its
 * landing column no longer pair up both ways, so `up` and `down` stop being
 * inverses at the poles. Odd widths are rejected instead.
 */
export class RectangleTopology implements Topology<RectangleSpherePoint> {
  readonly width: number;
  readonly height: number;
  readonly sheetCount = 1;
  readonly sheetWidth: number;
  readonly sheetHeight: number;
  readonly cellCount: number;

  constructor(width: number, height: number) {
    assertGridSize("width", width);
    assertGridSize("height", height);
    if (width % 2 !== 0) {
      throw new Error(`Rectangle sphere width must be even to pair antipodal columns, got ${width}`);
    }
    this.width = width;
    this.height = height;
    this.sheetWidth = width;
    this.sheetHeight = height;
    this.cellCount = width * height;
  }

  point(x: number, y: number): RectangleSpherePoint {
    return new RectangleSpherePoint(x, y, this.width, this.height);
  }

  pointAt(_sheet: number, x: number, y: number): RectangleSpherePoint {
    return new RectangleSpherePoint(x, y, this.width, this.height);
  }

  sheetOf(): number {
    return 0;
  }

  offsetOf(point: RectangleSpherePoint): number {
    return point.y * this.width + point.x;
  }

  contains(point: RectangleSpherePoint): boolean {
    return point.width === this.width && point.height === this.height;
  }

  sameAs(other: Topology<RectangleSpherePoint>): boolean {
    return other instanceof RectangleTopology && other.width === this.width && other.height === this.height;
  }

  fromGeographic(latitude: number, longitude: number): RectangleSpherePoint {
    return RectangleSpherePoint.fromGeographic(latitude, longitude, this.width, this.height);
  }

  describe(): string {
    return `rectangle sphere ${this.width}×${this.height}`;
  }
}

/** Build a `width × height` rectangle-sphere grid from a per-point initializer (row-major). */
export function createRectangleSphereGrid<T>(
  width: number,
  height: number,
  f: PointFn<RectangleSpherePoint, T>,
): SurfaceGrid<T, RectangleSpherePoint> {
  return SurfaceGrid.fromFn(new RectangleTopology(width, height), f);
}

export function createRectangleSphereGridPar<T>(
  width: number,
  height: number,
  f: PointFn<RectangleSpherePoint, T>,
  options?: ParallelOptions,
): Promise<SurfaceGrid<T, RectangleSpherePoint>> {
  return SurfaceGrid.fromFnPar(new RectangleTopology(width, height), f, options);
}
