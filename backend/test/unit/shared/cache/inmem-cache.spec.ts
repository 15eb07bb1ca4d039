import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { createTestClock } from '../../../helpers/build-test-app';

describe('InMemCache', () => {
  it('stores and returns values', async () => {
    const cache = new InMemCache();
    await cache.set('k', 'v');
    expect(await cache.get('k')).toBe('v');
    expect(await cache.get('missing')).toBeNull();
  });

  it('expires entries once their TTL has elapsed', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v', { ttlSeconds: 10 });

    clock.advanceSeconds(9);
    expect(await cache.get('k')).toBe('v');

    clock.advanceSeconds(1);
    expect(await cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('keeps entries without a TTL', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v');
    clock.advanceSeconds(365 * 86400);
    expect(await cache.get('k')).toBe('v');
  });

  it('resets the expiry when a key is set again', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v1', { ttlSeconds: 10 });
    clock.advanceSeconds(8);
    await cache.set('k', 'v2', { ttlSeconds: 10 });
    clock.advanceSeconds(8);

    expect(await cache.get('k')).toBe('v2');
  });

  it('moves the expiry of a live key', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.set('k', 'v', { ttlSeconds: 10 });
    clock.advanceSeconds(8);
    await cache.expire('k', 10);
    clock.advanceSeconds(8);

    expect(await cache.get('k')).toBe('v');

    clock.advanceSeconds(2);
    expect(await cache.get('k')).toBeNull();
  });

  it('does not create a key when expiring a missing or expired one', async () => {
    const clock = createTestClock();
    const cache = new InMemCache({ now: clock.now });

    await cache.expire('missing', 10);
    expect(await cache.get('missing')).toBeNull();

    await cache.set('k', 'v', { ttlSeconds: 5 });
    clock.advanceSeconds(5);
    await cache.expire('k', 10);

    expect(await cache.get('k')).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('deletes and clears', async () => {
    const cache = new InMemCache();
    await cache.set('a', '1');
    await cache.set('b', '2');

    await cache.del('a');
    expect(await cache.get('a')).toBeNull();
    expect(cache.size).toBe(1);

    await cache.close();
    expect(cache.size).toBe(0);
  });
});
