import * as THREE from "three";
import { CUBE_FACE_COUNT } from "../constants";
import type { Direction, PointFn, SpherePoint, Topology, Vec3, ParallelOptions } from "../types/grid-types";
import { assertGridSize, cellAt } from "../utils/grid-utils";
import { foldGeographic, latLonToPosition, positionToLatLon } from "../utils/sphere-math";
import {
  CubeFace, CUBE_ADJACENCY, CUBE_FACES, CUBE_FACE_INDEX,
  faceForDirection, faceSurfacePoint, projectOntoFace, remapEdgeCoordinate,
} from "./cube-face";
import { SurfaceGrid } from "./surface-grid";

/**
 * A cell on a cube-sphere grid: a face and a column/row on that face.
 *
 * Cells along a seam step onto the neighbouring face through
 * {@link CUBE_ADJACENCY}. The three cells meeting at a cube corner are
 * distinct points even though they sit next to the same corner.
 */
export class CubeSpherePoint implements SpherePoint<CubeSpherePoint> {
  readonly face: CubeFace;
  readonly x: number;
  readonly y: number;
  /** Cells along each edge of a face. */
  readonly size: number;

  /** Coordinates are clamped into [0, size) to absorb rounding at face edges. */
  constructor(face: CubeFace, x: number, y: number, size: number) {
    this.face = face;
    this.x = THREE.MathUtils.clamp(Math.trunc(x), 0, size - 1);
    this.y = THREE.MathUtils.clamp(Math.trunc(y), 0, size - 1);
    this.size = size;
  }

  /**
   * The cell whose patch of the sphere contains the given latitude/longitude
   * (radians). Latitude past a pole is folded back over it.
   */
  static fromGeographic(latitude: number, longitude: number, size: number): CubeSpherePoint {
    const [lat, lon] = foldGeographic(latitude, longitude);
    const direction = new THREE.Vector3(...latLonToPosition(lat, lon, 1));
    const face = faceForDirection(direction);
    const [u, v] = projectOntoFace(face, direction);
    return new CubeSpherePoint(face, cellAt((u + 1) / 2, size), cellAt((v + 1) / 2, size), size);
  }

  up(): CubeSpherePoint {
    return this.y > 0 ? this.at(this.x, this.y - 1) : this.crossEdge("up");
  }

  down(): CubeSpherePoint {
    return this.y < this.size - 1 ? this.at(this.x, this.y + 1) : this.crossEdge("down");
  }

  left(): CubeSpherePoint {
    return this.x > 0 ? this.at(this.x - 1, this.y) : this.crossEdge("left");
  }

  right(): CubeSpherePoint {
    return this.x < this.size - 1 ? this.at(this.x + 1, this.y) : this.crossEdge("right");
  }

  /**
   * Gnomonic projection of the cell center: the point on the cube surface,
   * pushed out along its ray onto the sphere of radius `scale`.
   */
  position(scale: number): Vec3 {
    const u = (2 * this.x + 1) / this.size - 1;
    const v = (2 * this.y + 1) / this.size - 1;
    const p = faceSurfacePoint(this.face, u, v).normalize().multiplyScalar(scale);
    return [p.x, p.y, p.z];
  }

  latitude(): number {
    return positionToLatLon(this.position(1)).latitude;
  }

  longitude(): number {
    return positionToLatLon(this.position(1)).longitude;
  }

  sphereCoordinates(): [number, number] {
    const { latitude, longitude } = positionToLatLon(this.position(1));
    return [longitude, latitude];
  }

  equals(other: CubeSpherePoint): boolean {
    return this.face === other.face && this.x === other.x && this.y === other.y && this.size === other.size;
  }

  key(): string {
    return `${this.face}(${this.x},${this.y})`;
  }

  private at(x: number, y: number): CubeSpherePoint {
    return new CubeSpherePoint(this.face, x, y, this.size);
  }

  private crossEdge(direction: Direction): CubeSpherePoint {
    const crossing = CUBE_ADJACENCY[this.face][direction];
    const t = direction === "up" || direction === "down" ? this.x : this.y;
    return new CubeSpherePoint(
      crossing.face,
      remapEdgeCoordinate(crossing.x, t, this.size),
      remapEdgeCoordinate(crossing.y, t, this.size),
      this.size,
    );
  }
}

/** Six `size × size` faces glued into a closed cube, projected onto a sphere. */
export class CubeTopology implements Topology<CubeSpherePoint> {
  readonly size: number;
  readonly sheetCount = CUBE_FACE_COUNT;
  readonly sheetWidth: number;
  readonly sheetHeight: number;
  readonly cellCount: number;

  constructor(size: number) {
    assertGridSize("face size", size);
    this.size = size;
    this.sheetWidth = size;
    this.sheetHeight = size;
    this.cellCount = CUBE_FACE_COUNT * size * size;
  }

  point(face: CubeFace, x: number, y: number): CubeSpherePoint {
    return new CubeSpherePoint(face, x, y, this.size);
  }

  pointAt(sheet: number, x: number, y: number): CubeSpherePoint {
    return new CubeSpherePoint(CUBE_FACES[sheet], x, y, this.size);
  }

  sheetOf(point: CubeSpherePoint): number {
    return CUBE_FACE_INDEX[point.face];
  }

  offsetOf(point: CubeSpherePoint): number {
    return point.y * this.size + point.x;
  }

  contains(point: CubeSpherePoint): boolean {
    return point.size === this.size;
  }

  sameAs(other: Topology<CubeSpherePoint>): boolean {
    return other instanceof CubeTopology && other.size === this.size;
  }

  fromGeographic(latitude: number, longitude: number): CubeSpherePoint {
    return CubeSpherePoint.fromGeographic(latitude, longitude, this.size);
  }

  describe(): string {
    return `cube sphere 6×${this.size}×${this.size}`;
  }
}

/** Build a cube-sphere grid with faces of `size × size` cells from a per-point initializer. */
export function createCubeSphereGrid<T>(size: number, f: PointFn<CubeSpherePoint, T>): SurfaceGrid<T, CubeSpherePoint> {
  return SurfaceGrid.fromFn(new CubeTopology(size), f);
}

export function createCubeSphereGridPar<T>(
  size: number,
  f: PointFn<CubeSpherePoint, T>,
  options?: ParallelOptions,
): Promise<SurfaceGrid<T, CubeSpherePoint>> {
  return SurfaceGrid.fromFnPar(new CubeTopology(size), f, options);
}
