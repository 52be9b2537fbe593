import { SurfaceGrid } from "../grid/surface-grid";
import type { DiagonalNeighboursFn, GridPoint, NeighboursFn, ParallelOptions } from "../types/grid-types";

/** The neighbourhood a rule reads: the 4 edge neighbours, or all 8 around the cell. */
export type Neighbourhood<T> =
  | { kind: "von-neumann"; rule: NeighboursFn<T, T> }
  | { kind: "moore"; rule: DiagonalNeighboursFn<T, T> };

/**
 * Cellular automaton over a surface grid, double-buffered: each step reads
 * the current grid, writes the spare one and swaps their storage. `current`
 * is the same grid object for the automaton's whole life, so callers can
 * hold on to it.
 */
export class DoubleBufferedAutomaton<T, P extends GridPoint<P>> {
  /** Steps taken since construction. */
  generation = 0;

  private readonly front: SurfaceGrid<T, P>;
  private readonly back: SurfaceGrid<T, P>;
  private readonly neighbourhood: Neighbourhood<T>;
  private stepping = false;

  /** Takes ownership of `initial`; it becomes `current`. */
  constructor(initial: SurfaceGrid<T, P>, neighbourhood: Neighbourhood<T>) {
    this.front = initial;
    this.back = SurfaceGrid.fromFn(initial.topology, (p) => initial.get(p));
    this.neighbourhood = neighbourhood;
  }

  get current(): SurfaceGrid<T, P> {
    return this.front;
  }

  step(): void {
    this.assertIdle();
    const { neighbourhood } = this;
    if (neighbourhood.kind === "moore") {
      this.back.setFromNeighboursDiagonals(this.front, neighbourhood.rule);
    } else {
      this.back.setFromNeighbours(this.front, neighbourhood.rule);
    }
    this.flip();
  }

  /** Parallel form of {@link DoubleBufferedAutomaton.step}; don't read `current` until it resolves. */
  async stepPar(options?: ParallelOptions): Promise<void> {
    this.assertIdle();
    this.stepping = true;
    try {
      const { neighbourhood } = this;
      if (neighbourhood.kind === "moore") {
        await this.back.setFromNeighboursDiagonalsPar(this.front, neighbourhood.rule, options);
      } else {
        await this.back.setFromNeighboursPar(this.front, neighbourhood.rule, options);
      }
    } finally {
      this.stepping = false;
    }
    this.flip();
  }

  /** Run `count` sequential steps. */
  run(count: number): void {
    for (let i = 0; i < count; i++) this.step();
  }

  private flip(): void {
    this.front.swap(this.back);
    this.generation++;
  }

  private assertIdle(): void {
    if (this.stepping) {
      throw new Error("Automaton is already stepping; await the pending stepPar() first");
    }
  }
}
