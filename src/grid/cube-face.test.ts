import * as THREE from "three";
import {
  CUBE_ADJACENCY, CUBE_FACES, CUBE_FACE_FRAMES, CUBE_FACE_INDEX,
  faceForDirection, faceSurfacePoint, projectOntoFace, remapEdgeCoordinate,
} from "./cube-face";
import type { Direction } from "../types/grid-types";

const DIRECTIONS: Direction[] = ["up", "down", "left", "right"];

describe("CUBE_FACES", () => {
  it("lists the six faces in storage order", () => {
    expect(CUBE_FACES).toEqual(["front", "back", "left", "right", "top", "bottom"]);
    CUBE_FACES.forEach((face, i) => expect(CUBE_FACE_INDEX[face]).toBe(i));
  });
});

describe("CUBE_FACE_FRAMES", () => {
  it("gives every face an orthonormal frame", () => {
    for (const face of CUBE_FACES) {
      const n = new THREE.Vector3(...CUBE_FACE_FRAMES[face].normal);
      const r = new THREE.Vector3(...CUBE_FACE_FRAMES[face].right);
      const u = new THREE.Vector3(...CUBE_FACE_FRAMES[face].up);
      expect(n.length()).toBe(1);
      expect(r.length()).toBe(1);
      expect(u.length()).toBe(1);
      expect(n.dot(r)).toBeCloseTo(0, 12);
      expect(n.dot(u)).toBeCloseTo(0, 12);
      expect(r.dot(u)).toBeCloseTo(0, 12);
    }
  });

  it("covers each axis direction exactly once with a normal", () => {
    const normals = CUBE_FACES.map((face) => CUBE_FACE_FRAMES[face].normal.join(","));
    expect(new Set(normals).size).toBe(6);
  });
});

describe("CUBE_ADJACENCY", () => {
  it("pairs every seam with exactly one entry on the other side", () => {
    for (const face of CUBE_FACES) {
      for (const direction of DIRECTIONS) {
        const target = CUBE_ADJACENCY[face][direction].face;
        expect(target).not.toBe(face);
        const back = DIRECTIONS.filter((d) => CUBE_ADJACENCY[target][d].face === face);
        expect(back).toHaveLength(1);
      }
    }
  });

  it("joins each face to the four faces that are not its opposite", () => {
    for (const face of CUBE_FACES) {
      const normal = new THREE.Vector3(...CUBE_FACE_FRAMES[face].normal);
      const neighbours = DIRECTIONS.map((d) => CUBE_ADJACENCY[face][d].face);
      expect(new Set(neighbours).size).toBe(4);
      for (const neighbour of neighbours) {
        expect(normal.dot(new THREE.Vector3(...CUBE_FACE_FRAMES[neighbour].normal))).toBeCloseTo(0, 12);
      }
    }
  });

  it("lands on a cell whose edge touches the edge that was crossed", () => {
    const size = 4;
    const edgeGap = 2 / size;
    for (const face of CUBE_FACES) {
      for (const direction of DIRECTIONS) {
        const crossing = CUBE_ADJACENCY[face][direction];
        for (let t = 0; t < size; t++) {
          const x = direction === "left" ? 0 : direction === "right" ? size - 1 : t;
          const y = direction === "up" ? 0 : direction === "down" ? size - 1 : t;
          const from = faceSurfacePoint(face, (2 * x + 1) / size - 1, (2 * y + 1) / size - 1);
          const tx = remapEdgeCoordinate(crossing.x, t, size);
          const ty = remapEdgeCoordinate(crossing.y, t, size);
          const to = faceSurfacePoint(crossing.face, (2 * tx + 1) / size - 1, (2 * ty + 1) / size - 1);
          // half a cell to the seam on each side, around a right-angle bend
          expect(from.distanceTo(to)).toBeCloseTo(Math.SQRT2 * edgeGap / 2, 12);
        }
      }
    }
  });
});

describe("remapEdgeCoordinate", () => {
  it("reads each remap against the crossed coordinate", () => {
    expect(remapEdgeCoordinate("first", 3, 10)).toBe(0);
    expect(remapEdgeCoordinate("last", 3, 10)).toBe(9);
    expect(remapEdgeCoordinate("same", 3, 10)).toBe(3);
    expect(remapEdgeCoordinate("flipped", 3, 10)).toBe(6);
  });
});

describe("faceSurfacePoint", () => {
  it("puts (0, 0) at the face center and row 0 toward `up`", () => {
    expect(faceSurfacePoint("front", 0, 0).toArray()).toEqual([0, 0, 1]);
    expect(faceSurfacePoint("front", -1, -1).toArray()).toEqual([-1, 1, 1]);
    expect(faceSurfacePoint("top", 1, -1).toArray()).toEqual([1, 1, -1]);
  });
});

describe("faceForDirection", () => {
  it("picks the axis with the largest magnitude", () => {
    expect(faceForDirection(new THREE.Vector3(0.2, 0.1, 0.9))).toBe("front");
    expect(faceForDirection(new THREE.Vector3(0.2, 0.1, -0.9))).toBe("back");
    expect(faceForDirection(new THREE.Vector3(-0.9, 0.1, 0.2))).toBe("left");
    expect(faceForDirection(new THREE.Vector3(0.9, 0.1, 0.2))).toBe("right");
    expect(faceForDirection(new THREE.Vector3(0.2, 0.9, 0.1))).toBe("top");
    expect(faceForDirection(new THREE.Vector3(0.2, -0.9, 0.1))).toBe("bottom");
  });

  it("breaks ties toward top/bottom, then front/back", () => {
    expect(faceForDirection(new THREE.Vector3(1, 1, 1))).toBe("top");
    expect(faceForDirection(new THREE.Vector3(1, -1, 0))).toBe("bottom");
    expect(faceForDirection(new THREE.Vector3(1, 0, 1))).toBe("front");
    expect(faceForDirection(new THREE.Vector3(-1, 0, -1))).toBe("back");
  });
});

describe("projectOntoFace", () => {
  it("inverts faceSurfacePoint along the ray", () => {
    for (const face of CUBE_FACES) {
      const ray = faceSurfacePoint(face, 0.25, -0.5).normalize();
      const [u, v] = projectOntoFace(face, ray);
      expect(u).toBeCloseTo(0.25, 12);
      expect(v).toBeCloseTo(-0.5, 12);
    }
  });
});
