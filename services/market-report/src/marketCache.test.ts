import { describe, expect, it, jest } from '@jest/globals';
import type { MarketView } from './domain.js';
import { MarketViewCache } from './marketCache.js';

const emptyView: MarketView = [];

describe('MarketViewCache', () => {
  it('shares one computation between concurrent callers', async () => {
    const cache = new MarketViewCache();
    let resolve: (view: MarketView) => void = () => undefined;
    const compute = jest.fn(() => new Promise<MarketView>((r) => (resolve = r)));

    const first = cache.getOrCompute({ direction: 'SELL' }, compute);
    const second = cache.getOrCompute({ direction: 'SELL' }, compute);
    resolve(emptyView);

    await expect(first).resolves.toBe(emptyView);
    await expect(second).resolves.toBe(emptyView);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('keys entries by direction and tax mode', async () => {
    const cache = new MarketViewCache();
    const compute = jest.fn(async () => emptyView);

    await cache.getOrCompute({ direction: 'SELL' }, compute);
    await cache.getOrCompute({ direction: 'BUY' }, compute);
    await cache.getOrCompute({ direction: 'SELL', taxMode: 'INCLUDED' }, compute);
    await cache.getOrCompute({ direction: 'SELL' }, compute);

    expect(compute).toHaveBeenCalledTimes(3);
    expect(MarketViewCache.keyOf({ direction: 'SELL' })).toBe('SELL:BID');
    expect(MarketViewCache.keyOf({ direction: 'BUY', taxMode: 'EXCLUDED' })).toBe('BUY:EXCLUDED');
  });

  it('forgets failed computations', async () => {
    const cache = new MarketViewCache();
    const failing = jest.fn(async (): Promise<MarketView> => {
      throw new Error('db down');
    });

    await expect(cache.getOrCompute({ direction: 'SELL' }, failing)).rejects.toThrow('db down');
    expect(cache.size).toBe(0);

    const compute = jest.fn(async () => emptyView);
    await expect(cache.getOrCompute({ direction: 'SELL' }, compute)).resolves.toBe(emptyView);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('evicts the oldest entry when full', async () => {
    const cache = new MarketViewCache(2);
    const compute = jest.fn(async () => emptyView);

    await cache.getOrCompute({ direction: 'SELL' }, compute);
    await cache.getOrCompute({ direction: 'BUY' }, compute);
    await cache.getOrCompute({ direction: 'SELL', taxMode: 'INCLUDED' }, compute);
    expect(cache.size).toBe(2);

    await cache.getOrCompute({ direction: 'BUY' }, compute);
    expect(compute).toHaveBeenCalledTimes(3);
    await cache.getOrCompute({ direction: 'SELL' }, compute);
    expect(compute).toHaveBeenCalledTimes(4);
  });

  it('recomputes after invalidation', async () => {
    const cache = new MarketViewCache();
    const compute = jest.fn(async () => emptyView);

    await cache.getOrCompute({ direction: 'SELL' }, compute);
    cache.invalidate();
    expect(cache.size).toBe(0);
    await cache.getOrCompute({ direction: 'SELL' }, compute);

    expect(compute).toHaveBeenCalledTimes(2);
  });
});
