export type PoolResult<T, R> =
  | { item: T; success: true; value: R }
  | { item: T; success: false; error: Error };

export interface PoolOptions<T, R> {
  maxConcurrency: number;
  /** Called once per item as soon as its handler settles. */
  onSettled?: (result: PoolResult<T, R>, settledCount: number) => void;
}

/**
 * Run `handler` over `items` with at most `maxConcurrency` in flight.
 * Results keep the input order; a failing item never stops the others.
 */
export async function processPool<T, R>(
  items: readonly T[],
  handler: (item: T) => Promise<R>,
  options: PoolOptions<T, R>,
): Promise<Array<PoolResult<T, R>>> {
  if (items.length === 0) {
    return [];
  }

  const requested = Number.isFinite(options.maxConcurrency)
    ? Math.floor(options.maxConcurrency)
    : 1;
  const concurrency = Math.max(1, Math.min(requested, items.length));
  const results = new Array<PoolResult<T, R>>(items.length);
  let nextIndex = 0;
  let settledCount = 0;

  const settle = (index: number, result: PoolResult<T, R>): void => {
    results[index] = result;
    settledCount++;
    options.onSettled?.(result, settledCount);
  };

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      const item = items[index];
      try {
        const value = await handler(item);
        settle(index, { item, success: true, value });
      } catch (error) {
        settle(index, {
          item,
          success: false,
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return results;
}
