/**
 * ConcurrentPool - Worker pool utility for concurrent task execution.
 *
 * Keeps up to N workers busy pulling from a shared queue. Results are
 * written into the slot of their input index, so output order never depends
 * on completion order.
 */
export class ConcurrentPool {
  /**
   * Process items concurrently using a worker pool pattern.
   *
   * After the first rejection no worker picks up a new item; items already
   * in flight run to completion and the pool rejects with the first error.
   *
   * @param items - Array of items to process
   * @param concurrency - Maximum number of concurrent workers (>= 1)
   * @param processFn - Async function to process each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @returns Array of results in the same order as the input items
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
  ): Promise<R[]> {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }

    const results: R[] = new Array(items.length);
    let nextIndex = 0;
    let failed = false;

    async function worker(): Promise<void> {
      while (!failed && nextIndex < items.length) {
        const index = nextIndex++;
        let result: R;
        try {
          result = await processFn(items[index], index);
        } catch (error) {
          failed = true;
          throw error;
        }
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workers = Array.from(
      { length: Math.min(concurrency, items.length) },
      () => worker(),
    );
    await Promise.all(workers);
    return results;
  }
}
