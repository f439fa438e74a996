import { describe, it, expect } from 'vitest';
import { mapInOrder } from './concurrency.js';
import { withTimeout } from './timeout.js';
import { ProviderTimeoutError } from '../errors.js';

const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('mapInOrder', () => {
  it('returns results in input order whatever the finish order', async () => {
    const results = await mapInOrder([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('treats a limit below one as sequential', async () => {
    const order: number[] = [];
    await mapInOrder([1, 2, 3], 0, async item => {
      order.push(item);
      await delay(1);
      return item;
    });

    expect(order).toEqual([1, 2, 3]);
  });

  it('handles an empty list', async () => {
    expect(await mapInOrder([], 4, async item => item)).toEqual([]);
  });
});

describe('withTimeout', () => {
  it('resolves with the task result when it finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 50)).resolves.toBe('done');
  });

  it('rejects with ProviderTimeoutError and aborts the task', async () => {
    let signal: AbortSignal | undefined;

    await expect(
      withTimeout(s => {
        signal = s;
        return new Promise<string>(() => undefined);
      }, 10)
    ).rejects.toBeInstanceOf(ProviderTimeoutError);
    expect(signal?.aborted).toBe(true);
  });

  it('passes task errors through', async () => {
    await expect(withTimeout(async () => Promise.reject(new Error('nope')), 50)).rejects.toThrow('nope');
  });
});
