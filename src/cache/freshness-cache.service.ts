import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CLOCK, type Clock } from '../common/clock';
import { describeError, FetchError, StoreError } from '../common/errors';
import type { JsonValue } from '../common/json';
import {
  ASSISTANT_EVENTS,
  type CacheFetchFailedEvent,
  type CacheHitEvent,
  type CacheRefreshedEvent,
  type CacheStaleServedEvent,
} from '../events/assistant.events';
import {
  CACHE_ENTRY_REPOSITORY,
  type CacheEntry,
  type ICacheEntryRepository,
} from '../store/store.types';
import type {
  CacheEntryStatus,
  CacheResult,
  DataFetcher,
} from './cache.types';

/**
 * Durable, TTL-governed read-through cache. Domain-agnostic: the TTL comes
 * with each call. A failed fetch falls back to whatever was last stored for
 * the key, however old.
 *
 * Concurrent misses on one key are not coalesced; each caller fetches and the
 * last write wins.
 */
@Injectable()
export class FreshnessCacheService {
  private readonly logger = new Logger(FreshnessCacheService.name);

  constructor(
    @Inject(CACHE_ENTRY_REPOSITORY)
    private readonly entries: ICacheEntryRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async get(
    key: string,
    ttlMs: number,
    fetcher: DataFetcher,
    forceRefresh = false,
  ): Promise<CacheResult> {
    assertTtl(ttlMs);
    const entry = this.entries.find(key);

    if (!forceRefresh && entry && this.clock.now() < entry.expiresAt) {
      this.logger.debug(`Cache hit: ${key}`);
      this.eventEmitter.emit(ASSISTANT_EVENTS.CACHE_HIT, {
        key,
        expiresAt: entry.expiresAt.toISOString(),
      } satisfies CacheHitEvent);
      return { ...entry, status: 'hit' };
    }

    let payload: JsonValue;
    try {
      this.logger.debug(`Fetching fresh data for: ${key}`);
      payload = await fetcher();
    } catch (error) {
      return this.fallback(key, entry, error);
    }

    const stored = this.write(key, payload, ttlMs);
    this.eventEmitter.emit(ASSISTANT_EVENTS.CACHE_REFRESHED, {
      key,
      forced: forceRefresh,
      expiresAt: stored.expiresAt.toISOString(),
    } satisfies CacheRefreshedEvent);
    return { ...stored, status: 'fresh' };
  }

  /** Reads without fetching. Expired entries only with `includeStale`. */
  peek(key: string, options: { includeStale?: boolean } = {}): CacheEntry | null {
    const entry = this.entries.find(key);
    if (!entry) return null;
    if (options.includeStale || this.clock.now() < entry.expiresAt) {
      return entry;
    }
    return null;
  }

  set(key: string, payload: JsonValue, ttlMs: number): CacheEntry {
    assertTtl(ttlMs);
    const entry = this.write(key, payload, ttlMs);
    this.logger.debug(`Set cache: ${key} (expires in ${ttlMs}ms)`);
    return entry;
  }

  invalidate(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) this.logger.debug(`Invalidated cache: ${key}`);
    return removed;
  }

  clear(): number {
    const count = this.entries.deleteAll();
    this.logger.log(`Cleared ${count} cache entries`);
    return count;
  }

  status(): Record<string, CacheEntryStatus> {
    const now = this.clock.now().getTime();
    const status: Record<string, CacheEntryStatus> = {};
    for (const entry of this.entries.findAll()) {
      const remaining = entry.expiresAt.getTime() - now;
      status[entry.key] = {
        fetchedAt: entry.fetchedAt.toISOString(),
        expiresAt: entry.expiresAt.toISOString(),
        expired: remaining <= 0,
        ttlRemainingMs: Math.max(0, remaining),
      };
    }
    return status;
  }

  private write(key: string, payload: JsonValue, ttlMs: number): CacheEntry {
    const fetchedAt = this.clock.now();
    const entry: CacheEntry = {
      key,
      payload,
      fetchedAt,
      expiresAt: new Date(fetchedAt.getTime() + ttlMs),
    };
    this.entries.upsert(entry);
    return entry;
  }

  private fallback(
    key: string,
    entry: CacheEntry | null,
    error: unknown,
  ): CacheResult {
    // A dead store is not an upstream outage; let it surface.
    if (error instanceof StoreError) throw error;

    const reason = describeError(error);
    if (entry) {
      this.logger.warn(`Failed to fetch ${key}, returning stale data: ${reason}`);
      this.eventEmitter.emit(ASSISTANT_EVENTS.CACHE_STALE_SERVED, {
        key,
        fetchedAt: entry.fetchedAt.toISOString(),
        reason,
      } satisfies CacheStaleServedEvent);
      return { ...entry, status: 'stale' };
    }

    this.logger.error(`Failed to fetch ${key}, no fallback data: ${reason}`);
    this.eventEmitter.emit(ASSISTANT_EVENTS.CACHE_FETCH_FAILED, {
      key,
      reason,
    } satisfies CacheFetchFailedEvent);
    throw new FetchError(key, error);
  }
}

function assertTtl(ttlMs: number): void {
  // Dates hold whole milliseconds; anything shorter would store expiresAt == fetchedAt.
  if (!Number.isFinite(ttlMs) || ttlMs < 1) {
    throw new RangeError(`TTL must be at least 1 millisecond, got ${ttlMs}`);
  }
}
