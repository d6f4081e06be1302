/**
 * Hierarchical aggregation: divide-and-conquer reduction of an arbitrary
 * number of summaries within a bounded context window.
 *
 * Order is preserved: batches are contiguous slices of the input, and each
 * level's outputs keep their batch order.
 */

/**
 * Reduces one batch to a single summary.
 *
 * @param batch - Contiguous slice of the current level
 * @param level - 1-based reduction level
 */
export type BatchReducer = (batch: string[], level: number) => Promise<string>;

/**
 * Reduction result.
 */
export interface HierarchicalResult {
  /** Final summary */
  result: string;

  /** Levels executed */
  levels: number;

  /** Total batch reductions (requests) */
  reductions: number;
}

/**
 * Split items into contiguous batches of `size` (last batch may be shorter).
 *
 * @param items - Items in input order
 * @param size - Batch size (>= 1)
 */
export function partitionBatches<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Reduce level by level until one summary remains.
 *
 * At least one level always runs, so a single over-budget summary is still
 * condensed. With batchSize >= 2 every level shrinks the list to
 * ceil(n / batchSize) < n, which bounds the number of levels by
 * ceil(log_batchSize(n)) + 1.
 *
 * @param items - Non-empty list of summaries
 * @param batchSize - Summaries per reduction (>= 2)
 * @param reduceBatch - Reducer issuing one request per batch
 */
export async function reduceHierarchically(
  items: readonly string[],
  batchSize: number,
  reduceBatch: BatchReducer
): Promise<HierarchicalResult> {
  if (items.length === 0) {
    throw new RangeError('Cannot reduce an empty list of summaries');
  }
  if (batchSize < 2) {
    throw new RangeError(`Batch size must be at least 2, got ${batchSize}`);
  }

  let level: readonly string[] = items;
  let levels = 0;
  let reductions = 0;

  do {
    levels += 1;
    const next: string[] = [];
    for (const batch of partitionBatches(level, batchSize)) {
      next.push(await reduceBatch(batch, levels));
      reductions += 1;
    }
    level = next;
  } while (level.length > 1);

  return { result: level[0], levels, reductions };
}
