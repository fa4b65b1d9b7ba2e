import { EventEmitter2 } from '@nestjs/event-emitter';
import { FetchError, StoreError } from '../common/errors';
import type { JsonValue } from '../common/json';
import type { DatabaseService } from '../store/database.service';
import type { ICacheEntryRepository } from '../store/store.types';
import { createTestStore, ManualClock, MINUTE_MS } from '../testing/test-store';
import { FreshnessCacheService } from './freshness-cache.service';

const START = new Date('2026-10-18T12:00:00.000Z');
const WEATHER_TTL = 30 * MINUTE_MS;

describe('FreshnessCacheService', () => {
  let database: DatabaseService;
  let entries: ICacheEntryRepository;
  let clock: ManualClock;
  let eventEmitter: EventEmitter2;
  let cache: FreshnessCacheService;

  beforeEach(() => {
    const store = createTestStore();
    database = store.database;
    entries = store.cacheEntries;
    clock = new ManualClock(START);
    eventEmitter = new EventEmitter2();
    cache = new FreshnessCacheService(entries, clock, eventEmitter);
  });

  afterEach(() => {
    database.close();
  });

  const fetcherOf = (payload: JsonValue) =>
    jest.fn<Promise<JsonValue>, []>().mockResolvedValue(payload);

  it('fetches and stores on a miss', async () => {
    const fetcher = fetcherOf({ temp: 64 });

    const result = await cache.get('weather', WEATHER_TTL, fetcher);

    expect(result).toEqual({
      key: 'weather',
      payload: { temp: 64 },
      status: 'fresh',
      fetchedAt: START,
      expiresAt: new Date('2026-10-18T12:30:00.000Z'),
    });
    expect(entries.find('weather')?.payload).toEqual({ temp: 64 });
  });

  it('serves a live entry without fetching again', async () => {
    const fetcher = fetcherOf({ temp: 64 });

    await cache.get('weather', WEATHER_TTL, fetcher);
    clock.advance(10 * MINUTE_MS);
    const second = await cache.get('weather', WEATHER_TTL, fetcher);

    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(second.status).toBe('hit');
    expect(second.payload).toEqual({ temp: 64 });
    expect(second.fetchedAt).toEqual(START);
  });

  it('fetches again once the entry reaches its expiry', async () => {
    const fetcher = jest
      .fn<Promise<JsonValue>, []>()
      .mockResolvedValueOnce({ temp: 64 })
      .mockResolvedValueOnce({ temp: 58 });

    await cache.get('weather', WEATHER_TTL, fetcher);
    clock.advance(WEATHER_TTL);
    const second = await cache.get('weather', WEATHER_TTL, fetcher);

    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(second.status).toBe('fresh');
    expect(second.payload).toEqual({ temp: 58 });
  });

  it('serves the expired entry when the fetch fails', async () => {
    entries.upsert({
      key: 'weather',
      payload: { temp: 61 },
      fetchedAt: new Date(START.getTime() - 31 * MINUTE_MS),
      expiresAt: new Date(START.getTime() - 1000),
    });
    const emit = jest.spyOn(eventEmitter, 'emit');
    const fetcher = jest
      .fn<Promise<JsonValue>, []>()
      .mockRejectedValue(new Error('upstream timeout'));

    const result = await cache.get('weather', WEATHER_TTL, fetcher);

    expect(result.status).toBe('stale');
    expect(result.payload).toEqual({ temp: 61 });
    expect(result.fetchedAt).toEqual(new Date('2026-10-18T11:29:00.000Z'));
    expect(emit).toHaveBeenCalledWith('cache.stale_served', {
      key: 'weather',
      fetchedAt: '2026-10-18T11:29:00.000Z',
      reason: 'upstream timeout',
    });
  });

  it('raises FetchError when nothing is stored to fall back on', async () => {
    const fetcher = jest
      .fn<Promise<JsonValue>, []>()
      .mockRejectedValue(new Error('upstream timeout'));

    const attempt = cache.get('todos:2026-10-18', 5 * MINUTE_MS, fetcher);

    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toMatchObject({ key: 'todos:2026-10-18' });
    expect(entries.find('todos:2026-10-18')).toBeNull();
  });

  it('bypasses a live entry when refresh is forced', async () => {
    await cache.get('weather', WEATHER_TTL, fetcherOf({ temp: 64 }));
    const refetch = fetcherOf({ temp: 66 });

    const result = await cache.get('weather', WEATHER_TTL, refetch, true);

    expect(refetch).toHaveBeenCalledTimes(1);
    expect(result.status).toBe('fresh');
    expect(cache.peek('weather')?.payload).toEqual({ temp: 66 });
  });

  it('falls back to the live entry when a forced refresh fails', async () => {
    await cache.get('weather', WEATHER_TTL, fetcherOf({ temp: 64 }));
    const failing = jest
      .fn<Promise<JsonValue>, []>()
      .mockRejectedValue(new Error('rate limited'));

    const result = await cache.get('weather', WEATHER_TTL, failing, true);

    expect(result.status).toBe('stale');
    expect(result.payload).toEqual({ temp: 64 });
  });

  it.each([0, 0.5, -5, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects a TTL of %p',
    async (ttl) => {
      const fetcher = fetcherOf({});

      await expect(cache.get('weather', ttl, fetcher)).rejects.toBeInstanceOf(
        RangeError,
      );
      expect(fetcher).not.toHaveBeenCalled();
    },
  );

  it('keeps the shortest allowed TTL strictly after the fetch time', async () => {
    const fetcher = fetcherOf({ temp: 64 });

    const first = await cache.get('weather', 1.5, fetcher);
    const second = await cache.get('weather', 1.5, fetcher);

    expect(first.expiresAt).toEqual(new Date('2026-10-18T12:00:00.001Z'));
    expect(second.status).toBe('hit');
    expect(fetcher).toHaveBeenCalledTimes(1);
  });

  it('rejects a sub-millisecond TTL on set', () => {
    expect(() => cache.set('weather', { temp: 64 }, 0.5)).toThrow(RangeError);
  });

  it('keeps entries across service instances on the same store', async () => {
    await cache.get('weather', WEATHER_TTL, fetcherOf({ temp: 64 }));
    const reopened = new FreshnessCacheService(entries, clock, eventEmitter);
    const fetcher = fetcherOf({ temp: 99 });

    const result = await reopened.get('weather', WEATHER_TTL, fetcher);

    expect(fetcher).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'hit', payload: { temp: 64 } });
  });

  it('does not mask store failures as stale reads', async () => {
    database.close();

    await expect(
      cache.get('weather', WEATHER_TTL, fetcherOf({ temp: 64 })),
    ).rejects.toBeInstanceOf(StoreError);
  });

  it('lets a fetcher store failure surface unchanged', async () => {
    await cache.get('weather', WEATHER_TTL, fetcherOf({ temp: 64 }));
    const storeFailure = new StoreError('nested read');
    const fetcher = jest.fn<Promise<JsonValue>, []>().mockRejectedValue(storeFailure);

    await expect(
      cache.get('weather', WEATHER_TTL, fetcher, true),
    ).rejects.toBe(storeFailure);
  });

  describe('peek', () => {
    it('hides expired entries unless asked for stale ones', async () => {
      cache.set('weather', { temp: 64 }, WEATHER_TTL);
      clock.advance(WEATHER_TTL + 1);

      expect(cache.peek('weather')).toBeNull();
      expect(cache.peek('weather', { includeStale: true })?.payload).toEqual({
        temp: 64,
      });
      expect(cache.peek('events:2026-10-18', { includeStale: true })).toBeNull();
    });
  });

  describe('maintenance', () => {
    it('reports remaining lifetime per key', () => {
      cache.set('weather', { temp: 64 }, WEATHER_TTL);
      cache.set('events:2026-10-18', [], 5 * MINUTE_MS);
      clock.advance(10 * MINUTE_MS);

      expect(cache.status()).toEqual({
        'events:2026-10-18': {
          fetchedAt: '2026-10-18T12:00:00.000Z',
          expiresAt: '2026-10-18T12:05:00.000Z',
          expired: true,
          ttlRemainingMs: 0,
        },
        weather: {
          fetchedAt: '2026-10-18T12:00:00.000Z',
          expiresAt: '2026-10-18T12:30:00.000Z',
          expired: false,
          ttlRemainingMs: 20 * MINUTE_MS,
        },
      });
    });

    it('invalidates single keys and clears everything', () => {
      cache.set('weather', { temp: 64 }, WEATHER_TTL);
      cache.set('todos:2026-10-18', [], 5 * MINUTE_MS);
      cache.set('todos:2026-10-19', [], 5 * MINUTE_MS);

      expect(cache.invalidate('weather')).toBe(true);
      expect(cache.invalidate('weather')).toBe(false);
      expect(cache.clear()).toBe(2);
      expect(cache.status()).toEqual({});
    });
  });
});
