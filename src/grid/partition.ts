import { setImmediate } from "node:timers/promises";
import { DEFAULT_PARTITIONS } from "../constants";
import type { ParallelOptions } from "../types/grid-types";

/** A run of rows `[rowStart, rowEnd)` inside one sheet of a grid's storage. */
export interface RowPartition {
  sheet: number;
  rowStart: number;
  rowEnd: number;
}

/** Number of partitions requested by `options`, or the default. */
export function partitionCount(options?: ParallelOptions): number {
  const count = options?.partitions ?? DEFAULT_PARTITIONS;
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error(`Partition count must be a positive integer, got ${count}`);
  }
  return count;
}

/**
 * Split the rows of `sheetCount` sheets into disjoint partitions.
 *
 * Every partition holds at most ⌈sheetCount·rows / count⌉ rows and never
 * spans two sheets, so a face boundary always starts a new partition. The
 * partitions cover every row exactly once, in storage order.
 */
export function partitionRows(sheetCount: number, rows: number, count: number): RowPartition[] {
  const total = sheetCount * rows;
  const rowsPerPartition = Math.max(1, Math.ceil(total / count));

  const partitions: RowPartition[] = [];
  for (let sheet = 0; sheet < sheetCount; sheet++) {
    for (let rowStart = 0; rowStart < rows; rowStart += rowsPerPartition) {
      partitions.push({ sheet, rowStart, rowEnd: Math.min(rows, rowStart + rowsPerPartition) });
    }
  }
  return partitions;
}

/**
 * Fork-join: schedule one task per partition and settle once every one of
 * them has run or been skipped. Each task must write only its own
 * partition's rows.
 *
 * Partitions take turns on the calling thread, one macrotask each, so the
 * event loop stays responsive between them; they never run concurrently and
 * give no speed-up over a sequential pass.
 *
 * Once a task throws, partitions that have not started yet are skipped, and
 * the returned promise rejects with the first error after all scheduled
 * macrotasks have finished. Nothing writes to the grid after it rejects.
 */
export async function runPartitions(
  partitions: readonly RowPartition[],
  task: (partition: RowPartition) => void,
): Promise<void> {
  let failed = false;
  const results = await Promise.allSettled(partitions.map(async (partition) => {
    await setImmediate();
    if (failed) return;
    try {
      task(partition);
    } catch (err) {
      failed = true;
      throw err;
    }
  }));

  const rejection = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (rejection) throw rejection.reason;
}
