import type {
  GridPoint, Topology, PointFn, NeighboursFn, DiagonalNeighboursFn, ParallelOptions,
} from "../types/grid-types";
import { partitionCount, partitionRows, runPartitions, RowPartition } from "./partition";

/**
 * A dense grid of values wrapped around a surface.
 *
 * Storage is one row-major array per sheet of the topology (one sheet for the
 * rectangle sphere, one per face for the cube sphere). A point is an index
 * into that storage, never a reference to a cell.
 *
 * Every operation here is total for points produced by the grid's own
 * topology; points of another shape or size are rejected.
 */
export class SurfaceGrid<T, P extends GridPoint<P>> implements Iterable<[P, T]> {
  readonly topology: Topology<P>;
  private sheets: T[][];

  private constructor(topology: Topology<P>, sheets: T[][]) {
    this.topology = topology;
    this.sheets = sheets;
  }

  /**
   * Build a grid by calling `f` exactly once for every point: sheet by sheet,
   * row-major inside each sheet.
   */
  static fromFn<T, P extends GridPoint<P>>(topology: Topology<P>, f: PointFn<P, T>): SurfaceGrid<T, P> {
    const sheets = allocateSheets<T>(topology);
    for (let s = 0; s < topology.sheetCount; s++) {
      fillRows(topology, sheets[s], s, 0, topology.sheetHeight, f);
    }
    return new SurfaceGrid(topology, sheets);
  }

  /** Parallel form of {@link SurfaceGrid.fromFn}; `f` must be pure. */
  static async fromFnPar<T, P extends GridPoint<P>>(
    topology: Topology<P>,
    f: PointFn<P, T>,
    options?: ParallelOptions,
  ): Promise<SurfaceGrid<T, P>> {
    const sheets = allocateSheets<T>(topology);
    await runRows(topology, options, (p) => fillRows(topology, sheets[p.sheet], p.sheet, p.rowStart, p.rowEnd, f));
    return new SurfaceGrid(topology, sheets);
  }

  /** A grid with every cell set to `value` (pass the payload's zero for a cleared grid). */
  static filled<T, P extends GridPoint<P>>(topology: Topology<P>, value: T): SurfaceGrid<T, P> {
    const size = topology.sheetWidth * topology.sheetHeight;
    const sheets: T[][] = [];
    for (let s = 0; s < topology.sheetCount; s++) {
      sheets.push(new Array<T>(size).fill(value));
    }
    return new SurfaceGrid(topology, sheets);
  }

  get cellCount(): number {
    return this.topology.cellCount;
  }

  get(point: P): T {
    this.assertContains(point);
    return this.sheets[this.topology.sheetOf(point)][this.topology.offsetOf(point)];
  }

  set(point: P, value: T): void {
    this.assertContains(point);
    this.sheets[this.topology.sheetOf(point)][this.topology.offsetOf(point)] = value;
  }

  /**
   * Overwrite every cell in place, in {@link SurfaceGrid.fromFn} order.
   * `f` sees cells of this grid part-way through the update, so it should
   * read from another grid.
   */
  setFromFn(f: PointFn<P, T>): void {
    for (let s = 0; s < this.topology.sheetCount; s++) {
      fillRows(this.topology, this.sheets[s], s, 0, this.topology.sheetHeight, f);
    }
  }

  /** Parallel form of {@link SurfaceGrid.setFromFn}; `f` must be pure. */
  async setFromFnPar(f: PointFn<P, T>, options?: ParallelOptions): Promise<void> {
    const { topology, sheets } = this;
    await runRows(topology, options, (p) => fillRows(topology, sheets[p.sheet], p.sheet, p.rowStart, p.rowEnd, f));
  }

  /** New grid where each cell is `f(current, up, down, left, right)` of this one. */
  mapNeighbours<R>(f: NeighboursFn<T, R>): SurfaceGrid<R, P> {
    return SurfaceGrid.fromFn(this.topology, neighbours(this, f));
  }

  /**
   * New grid where each cell is `f` of its 3×3 neighbourhood in this one.
   * Diagonals are composed moves (`up().left()` and so on); near a cube
   * corner they are not the unique diagonal a flat grid would have.
   */
  mapNeighboursDiagonals<R>(f: DiagonalNeighboursFn<T, R>): SurfaceGrid<R, P> {
    return SurfaceGrid.fromFn(this.topology, diagonalNeighbours(this, f));
  }

  mapNeighboursPar<R>(f: NeighboursFn<T, R>, options?: ParallelOptions): Promise<SurfaceGrid<R, P>> {
    return SurfaceGrid.fromFnPar(this.topology, neighbours(this, f), options);
  }

  mapNeighboursDiagonalsPar<R>(
    f: DiagonalNeighboursFn<T, R>,
    options?: ParallelOptions,
  ): Promise<SurfaceGrid<R, P>> {
    return SurfaceGrid.fromFnPar(this.topology, diagonalNeighbours(this, f), options);
  }

  /**
   * Write `f(current, up, down, left, right)` of `source` into this grid.
   * `source` must be a distinct grid of the same topology; together with
   * {@link SurfaceGrid.swap} this double-buffers a simulation step.
   */
  setFromNeighbours<U>(source: SurfaceGrid<U, P>, f: NeighboursFn<U, T>): void {
    this.assertDistinctSource(source);
    this.setFromFn(neighbours(source, f));
  }

  setFromNeighboursDiagonals<U>(source: SurfaceGrid<U, P>, f: DiagonalNeighboursFn<U, T>): void {
    this.assertDistinctSource(source);
    this.setFromFn(diagonalNeighbours(source, f));
  }

  async setFromNeighboursPar<U>(
    source: SurfaceGrid<U, P>,
    f: NeighboursFn<U, T>,
    options?: ParallelOptions,
  ): Promise<void> {
    this.assertDistinctSource(source);
    await this.setFromFnPar(neighbours(source, f), options);
  }

  async setFromNeighboursDiagonalsPar<U>(
    source: SurfaceGrid<U, P>,
    f: DiagonalNeighboursFn<U, T>,
    options?: ParallelOptions,
  ): Promise<void> {
    this.assertDistinctSource(source);
    await this.setFromFnPar(diagonalNeighbours(source, f), options);
  }

  /** Replace every value with `f(value, point)`, in place. */
  updateEach(f: (value: T, point: P) => T): void {
    const { topology } = this;
    for (let s = 0; s < topology.sheetCount; s++) {
      const sheet = this.sheets[s];
      for (let y = 0; y < topology.sheetHeight; y++) {
        for (let x = 0; x < topology.sheetWidth; x++) {
          const i = y * topology.sheetWidth + x;
          sheet[i] = f(sheet[i], topology.pointAt(s, x, y));
        }
      }
    }
  }

  /**
   * Exchange backing storage with `other` (same topology). Neither grid is
   * copied, so a double-buffered step never reallocates.
   */
  swap(other: SurfaceGrid<T, P>): void {
    this.assertSameTopology(other);
    const sheets = this.sheets;
    this.sheets = other.sheets;
    other.sheets = sheets;
  }

  /** Every point with its value, in {@link SurfaceGrid.fromFn} order. */
  *iter(): Generator<[P, T]> {
    const { topology } = this;
    for (let s = 0; s < topology.sheetCount; s++) {
      const sheet = this.sheets[s];
      for (let y = 0; y < topology.sheetHeight; y++) {
        for (let x = 0; x < topology.sheetWidth; x++) {
          yield [topology.pointAt(s, x, y), sheet[y * topology.sheetWidth + x]];
        }
      }
    }
  }

  /** Every point of the grid, in {@link SurfaceGrid.fromFn} order. */
  *points(): Generator<P> {
    for (const [point] of this.iter()) {
      yield point;
    }
  }

  [Symbol.iterator](): Iterator<[P, T]> {
    return this.iter();
  }

  /**
   * Visit every cell once, partition by partition. Visits within a partition
   * are in storage order; partitions may interleave.
   */
  async forEachPar(f: (point: P, value: T) => void, options?: ParallelOptions): Promise<void> {
    const { topology, sheets } = this;
    await runRows(topology, options, ({ sheet, rowStart, rowEnd }) => {
      for (let y = rowStart; y < rowEnd; y++) {
        for (let x = 0; x < topology.sheetWidth; x++) {
          f(topology.pointAt(sheet, x, y), sheets[sheet][y * topology.sheetWidth + x]);
        }
      }
    });
  }

  private assertContains(point: P): void {
    if (!this.topology.contains(point)) {
      throw new Error(`Point ${point.key()} does not belong to a ${this.topology.describe()} grid`);
    }
  }

  private assertSameTopology<U>(other: SurfaceGrid<U, P>): void {
    if (!this.topology.sameAs(other.topology)) {
      throw new Error(
        `Grid topologies differ: ${this.topology.describe()} vs ${other.topology.describe()}`,
      );
    }
  }

  private assertDistinctSource<U>(source: SurfaceGrid<U, P>): void {
    this.assertSameTopology(source);
    const target: object = this;
    if (source === target) {
      throw new Error("Neighbour source must be a different grid from the one being written");
    }
  }
}

function allocateSheets<T>(topology: { sheetCount: number; sheetWidth: number; sheetHeight: number }): T[][] {
  const size = topology.sheetWidth * topology.sheetHeight;
  const sheets: T[][] = [];
  for (let s = 0; s < topology.sheetCount; s++) {
    sheets.push(new Array<T>(size));
  }
  return sheets;
}

function fillRows<T, P extends GridPoint<P>>(
  topology: Topology<P>,
  sheet: T[],
  s: number,
  rowStart: number,
  rowEnd: number,
  f: PointFn<P, T>,
): void {
  const width = topology.sheetWidth;
  for (let y = rowStart; y < rowEnd; y++) {
    for (let x = 0; x < width; x++) {
      sheet[y * width + x] = f(topology.pointAt(s, x, y));
    }
  }
}

function runRows<P extends GridPoint<P>>(
  topology: Topology<P>,
  options: ParallelOptions | undefined,
  task: (partition: RowPartition) => void,
): Promise<void> {
  const partitions = partitionRows(topology.sheetCount, topology.sheetHeight, partitionCount(options));
  return runPartitions(partitions, task);
}

function neighbours<U, T, P extends GridPoint<P>>(
  source: SurfaceGrid<U, P>,
  f: NeighboursFn<U, T>,
): PointFn<P, T> {
  return (p) => f(source.get(p), source.get(p.up()), source.get(p.down()), source.get(p.left()), source.get(p.right()));
}

function diagonalNeighbours<U, T, P extends GridPoint<P>>(
  source: SurfaceGrid<U, P>,
  f: DiagonalNeighboursFn<U, T>,
): PointFn<P, T> {
  return (p) => {
    const up = p.up();
    const down = p.down();
    return f(
      source.get(up.left()), source.get(up), source.get(up.right()),
      source.get(p.left()), source.get(p), source.get(p.right()),
      source.get(down.left()), source.get(down), source.get(down.right()),
    );
  };
}
