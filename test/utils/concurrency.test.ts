import { describe, it, expect } from 'vitest';
import { forEachLimit } from '../../src/utils/concurrency.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('forEachLimit', () => {
  it('should process items one at a time by default', async () => {
    const seen: number[] = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const result = await forEachLimit([1, 2, 3], async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(1);
      seen.push(item);
      inFlight--;
    });

    expect(seen).toEqual([1, 2, 3]);
    expect(maxInFlight).toBe(1);
    expect(result).toEqual({ started: 3, cancelled: false });
  });

  it('should respect the concurrency limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await forEachLimit([1, 2, 3, 4, 5, 6], async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(5);
      inFlight--;
    }, { concurrency: 2 });

    expect(maxInFlight).toBe(2);
  });

  it('should fall back to one worker for a non-finite limit', async () => {
    const seen: number[] = [];
    let inFlight = 0;
    let maxInFlight = 0;

    const result = await forEachLimit([1, 2, 3], async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(1);
      seen.push(item);
      inFlight--;
    }, { concurrency: Number.NaN });

    expect(seen).toEqual([1, 2, 3]);
    expect(maxInFlight).toBe(1);
    expect(result).toEqual({ started: 3, cancelled: false });
  });

  it('should pass the item index', async () => {
    const indexes: number[] = [];
    await forEachLimit(['a', 'b'], async (_item, index) => {
      indexes.push(index);
    });
    expect(indexes).toEqual([0, 1]);
  });

  it('should not start new items after abort', async () => {
    const controller = new AbortController();
    const seen: string[] = [];

    const result = await forEachLimit(['a', 'b', 'c'], async (item) => {
      seen.push(item);
      if (item === 'b') {
        controller.abort();
      }
    }, { signal: controller.signal });

    expect(seen).toEqual(['a', 'b']);
    expect(result).toEqual({ started: 2, cancelled: true });
  });

  it('should resolve immediately for an empty list', async () => {
    expect(await forEachLimit([], async () => undefined)).toEqual({ started: 0, cancelled: false });
  });

  it('should propagate a rejection', async () => {
    await expect(forEachLimit([1], async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });
});
