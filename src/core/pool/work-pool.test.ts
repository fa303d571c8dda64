import { processPool, PoolResult } from './work-pool';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('processPool', () => {
  it('should return results in input order', async () => {
    const results = await processPool(
      [30, 10, 20],
      async (ms) => {
        await delay(ms);
        return ms * 2;
      },
      { maxConcurrency: 3 },
    );

    expect(results).toEqual([
      { item: 30, success: true, value: 60 },
      { item: 10, success: true, value: 20 },
      { item: 20, success: true, value: 40 },
    ]);
  });

  it('should handle empty items', async () => {
    const handler = jest.fn(async (item: number) => item);

    await expect(processPool([], handler, { maxConcurrency: 3 })).resolves.toEqual([]);
    expect(handler).not.toHaveBeenCalled();
  });

  it('should respect max concurrency', async () => {
    let active = 0;
    let maxActive = 0;

    await processPool(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await delay(10);
        active--;
      },
      { maxConcurrency: 2 },
    );

    expect(maxActive).toBe(2);
  });

  it('should record failures without stopping the other items', async () => {
    const results = await processPool(
      [1, 2, 3],
      async (item) => {
        if (item === 2) {
          throw new Error('test error');
        }
        return item;
      },
      { maxConcurrency: 2 },
    );

    expect(results.map((r) => r.success)).toEqual([true, false, true]);
    const failed = results[1];
    expect(failed.success === false && failed.error.message).toBe('test error');
  });

  it('should wrap non-Error rejections', async () => {
    const results = await processPool(
      ['x'],
      async () => {
        throw 'plain string';
      },
      { maxConcurrency: 1 },
    );

    const [result] = results;
    expect(result.success).toBe(false);
    expect(result.success === false && result.error.message).toBe('plain string');
  });

  it('should fall back to one worker for invalid concurrency', async () => {
    const processed: number[] = [];

    await processPool(
      [1, 2, 3],
      async (item) => {
        processed.push(item);
      },
      { maxConcurrency: 0 },
    );

    expect(processed).toEqual([1, 2, 3]);
  });

  it('should report each settled item', async () => {
    const seen: Array<[PoolResult<number, number>, number]> = [];

    await processPool([1, 2], async (item) => item, {
      maxConcurrency: 1,
      onSettled: (result, count) => seen.push([result, count]),
    });

    expect(seen).toEqual([
      [{ item: 1, success: true, value: 1 }, 1],
      [{ item: 2, success: true, value: 2 }, 2],
    ]);
  });
});
