import { LIFE_BIRTH, LIFE_SURVIVAL } from "../constants";
import type { GridPoint } from "../types/grid-types";
import type { SurfaceGrid } from "../grid/surface-grid";

/**
 * Conway's Game of Life (B3/S23) as a Moore-neighbourhood rule, for
 * {@link SurfaceGrid.setFromNeighboursDiagonals} and friends.
 */
export function lifeRule(
  upLeft: boolean, up: boolean, upRight: boolean,
  left: boolean, current: boolean, right: boolean,
  downLeft: boolean, down: boolean, downRight: boolean,
): boolean {
  const alive = [upLeft, up, upRight, left, right, downLeft, down, downRight].filter(Boolean).length;
  return current ? LIFE_SURVIVAL.includes(alive) : LIFE_BIRTH.includes(alive);
}

/** Number of live cells. */
export function population<P extends GridPoint<P>>(grid: SurfaceGrid<boolean, P>): number {
  let count = 0;
  for (const [, alive] of grid) {
    if (alive) count++;
  }
  return count;
}
