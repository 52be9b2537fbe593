import * as THREE from "three";
import type { Direction, Vec3 } from "../types/grid-types";

export type CubeFace = "front" | "back" | "left" | "right" | "top" | "bottom";

/** Faces in storage order: a cube grid keeps one sheet per face, in this order. */
export const CUBE_FACES: readonly CubeFace[] = ["front", "back", "left", "right", "top", "bottom"];

export const CUBE_FACE_INDEX: Readonly<Record<CubeFace, number>> = {
  front: 0,
  back: 1,
  left: 2,
  right: 3,
  top: 4,
  bottom: 5,
};

/**
 * Orientation of a face on the unit cube.
 *
 * The cube-surface point of face coordinates (u, v) ∈ [-1, 1]² is
 * `normal + u·right − v·up`: grid x runs along `right`, grid y runs against
 * `up` (row 0 is the top row).
 */
export interface FaceFrame {
  normal: Vec3;
  right: Vec3;
  up: Vec3;
}

/**
 * Front/Top/Back/Bottom share one `up` belt and Front/Right/Back/Left share
 * one `right` belt. Back is turned upside down (and so mirrored) to sit on
 * both belts.
 */
export const CUBE_FACE_FRAMES: Readonly<Record<CubeFace, FaceFrame>> = {
  front: { normal: [0, 0, 1], right: [1, 0, 0], up: [0, 1, 0] },
  right: { normal: [1, 0, 0], right: [0, 0, -1], up: [0, 1, 0] },
  back: { normal: [0, 0, -1], right: [-1, 0, 0], up: [0, -1, 0] },
  left: { normal: [-1, 0, 0], right: [0, 0, 1], up: [0, 1, 0] },
  top: { normal: [0, 1, 0], right: [1, 0, 0], up: [0, 0, -1] },
  bottom: { normal: [0, -1, 0], right: [1, 0, 0], up: [0, 0, 1] },
};

/**
 * Where a coordinate lands after crossing an edge, given `t`, the coordinate
 * along the crossed edge (x for up/down moves, y for left/right moves).
 */
export type EdgeCoordinate =
  | "first"    // 0
  | "last"     // S − 1
  | "same"     // t
  | "flipped"; // S − 1 − t

export interface EdgeCrossing {
  face: CubeFace;
  x: EdgeCoordinate;
  y: EdgeCoordinate;
}

/**
 * Edge-crossing table: the cell reached by stepping off each edge of each
 * face. Every seam appears twice (once from each side) and the two entries
 * are inverse: stepping back across the seam from the landing cell returns
 * to the starting cell.
 */
export const CUBE_ADJACENCY: Readonly<Record<CubeFace, Readonly<Record<Direction, EdgeCrossing>>>> = {
  front: {
    up: { face: "top", x: "same", y: "last" },
    down: { face: "bottom", x: "same", y: "first" },
    left: { face: "left", x: "last", y: "same" },
    right: { face: "right", x: "first", y: "same" },
  },
  right: {
    up: { face: "top", x: "last", y: "flipped" },
    down: { face: "bottom", x: "last", y: "same" },
    left: { face: "front", x: "last", y: "same" },
    right: { face: "back", x: "first", y: "flipped" },
  },
  back: {
    up: { face: "bottom", x: "flipped", y: "last" },
    down: { face: "top", x: "flipped", y: "first" },
    left: { face: "right", x: "last", y: "flipped" },
    right: { face: "left", x: "first", y: "flipped" },
  },
  left: {
    up: { face: "top", x: "first", y: "same" },
    down: { face: "bottom", x: "first", y: "flipped" },
    left: { face: "back", x: "last", y: "flipped" },
    right: { face: "front", x: "first", y: "same" },
  },
  top: {
    up: { face: "back", x: "flipped", y: "last" },
    down: { face: "front", x: "same", y: "first" },
    left: { face: "left", x: "same", y: "first" },
    right: { face: "right", x: "flipped", y: "first" },
  },
  bottom: {
    up: { face: "front", x: "same", y: "last" },
    down: { face: "back", x: "flipped", y: "first" },
    left: { face: "left", x: "flipped", y: "last" },
    right: { face: "right", x: "same", y: "last" },
  },
};

export function remapEdgeCoordinate(coordinate: EdgeCoordinate, t: number, size: number): number {
  switch (coordinate) {
    case "first":
      return 0;
    case "last":
      return size - 1;
    case "same":
      return t;
    case "flipped":
      return size - 1 - t;
  }
}

/** Point on the unit cube (not yet normalized) for face coordinates (u, v). */
export function faceSurfacePoint(face: CubeFace, u: number, v: number): THREE.Vector3 {
  const { normal, right, up } = CUBE_FACE_FRAMES[face];
  return new THREE.Vector3(...normal)
    .addScaledVector(new THREE.Vector3(...right), u)
    .addScaledVector(new THREE.Vector3(...up), -v);
}

/**
 * The face a ray from the cube's center leaves through: the axis with the
 * largest magnitude wins, ties going to Top/Bottom, then Front/Back.
 */
export function faceForDirection(direction: THREE.Vector3): CubeFace {
  const ax = Math.abs(direction.x);
  const ay = Math.abs(direction.y);
  const az = Math.abs(direction.z);

  if (ay >= ax && ay >= az) return direction.y >= 0 ? "top" : "bottom";
  if (az >= ax) return direction.z >= 0 ? "front" : "back";
  return direction.x >= 0 ? "right" : "left";
}

/**
 * Face coordinates (u, v) where the ray along `direction` crosses `face`:
 * the direction is scaled onto the face plane, then read along the face's
 * axes. Only meaningful for the face {@link faceForDirection} picks.
 */
export function projectOntoFace(face: CubeFace, direction: THREE.Vector3): [number, number] {
  const { normal, right, up } = CUBE_FACE_FRAMES[face];
  const onFace = direction.clone().divideScalar(direction.dot(new THREE.Vector3(...normal)));
  return [onFace.dot(new THREE.Vector3(...right)), -onFace.dot(new THREE.Vector3(...up))];
}
