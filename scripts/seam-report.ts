/* eslint-disable no-console */
/**
 * Checks the cube-sphere seams for a given face size and prints a report.
 *
 * Usage: npx tsx scripts/seam-report.ts [size]
 *
 * For every cell and direction, the cell reached must list the starting cell
 * among its own neighbours, and the two cells must sit no further apart on
 * the unit sphere than two cells on the cube. Walking 4·size steps along a
 * belt (up on front/top/back/bottom, right on front/right/back/left) must
 * return to the start. Exits non-zero if any check fails.
 */

import { CubeFace, CUBE_FACES, CUBE_ADJACENCY } from "../src/grid/cube-face";
import { CubeSpherePoint, CubeTopology, createCubeSphereGrid } from "../src/grid/cube-topology";
import type { Direction, Vec3 } from "../src/types/grid-types";

const DIRECTIONS: Direction[] = ["up", "down", "left", "right"];

const BELTS: { direction: Direction; faces: CubeFace[] }[] = [
  { direction: "up", faces: ["front", "top", "back", "bottom"] },
  { direction: "right", faces: ["front", "right", "back", "left"] },
];

function distance(a: Vec3, b: Vec3): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1], a[2] - b[2]);
}

function walk(start: CubeSpherePoint, direction: Direction, steps: number): CubeSpherePoint {
  let p = start;
  for (let i = 0; i < steps; i++) p = p[direction]();
  return p;
}

async function main() {
  const size = Number(process.argv[2] ?? 8);
  const topology = new CubeTopology(size);
  const maxStep = 2 / size;
  console.error(`Checking ${topology.describe()} (${topology.cellCount} cells)...`);

  // Per-cell count of directions whose neighbour does not point back
  const broken = createCubeSphereGrid(size, (p) =>
    DIRECTIONS.filter((d) => {
      const q = p[d]();
      return !DIRECTIONS.some((e) => q[e]().equals(p));
    }).length,
  );

  let farthest = 0;
  for (const p of broken.points()) {
    for (const d of DIRECTIONS) {
      farthest = Math.max(farthest, distance(p.position(1), p[d]().position(1)));
    }
  }

  let failures = 0;

  console.log(`Seams (${topology.describe()})`);
  for (const face of CUBE_FACES) {
    for (const d of DIRECTIONS) {
      const crossing = CUBE_ADJACENCY[face][d];
      console.log(`  ${face.padEnd(6)} ${d.padEnd(5)} -> ${crossing.face.padEnd(6)} x=${crossing.x.padEnd(7)} y=${crossing.y}`);
    }
    let faceBroken = 0;
    for (const [p, count] of broken) {
      if (p.face === face) faceBroken += count;
    }
    console.log(`  ${face.padEnd(6)} inconsistent moves: ${faceBroken}`);
    failures += faceBroken;
  }

  const stepOk = farthest <= maxStep + 1e-12;
  console.log(`Largest neighbour step: ${farthest.toFixed(6)} (limit ${maxStep.toFixed(6)}) ${stepOk ? "ok" : "FAIL"}`);
  if (!stepOk) failures++;

  for (const { direction, faces } of BELTS) {
    let open = 0;
    for (const face of faces) {
      for (let y = 0; y < size; y++) {
        for (let x = 0; x < size; x++) {
          const start = topology.point(face, x, y);
          if (!walk(start, direction, 4 * size).equals(start)) open++;
        }
      }
    }
    console.log(`Belt ${faces.join("/")} going ${direction}: ${open === 0 ? "closed" : `${open} open loops`}`);
    failures += open;
  }

  if (failures > 0) throw new Error(`${failures} seam check(s) failed`);
  console.error("All seam checks passed");
}

main().catch(err => { console.error(err); process.exit(1); });
/* eslint-enable no-console */
