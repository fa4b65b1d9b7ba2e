import type { JsonValue } from '../common/json';

/** Zero-argument data source call supplied by a domain wrapper. */
export type DataFetcher = () => Promise<JsonValue>;

/**
 * - `hit`: unexpired entry served without fetching
 * - `fresh`: fetched and persisted during this call
 * - `stale`: fetch failed, the previous (possibly expired) entry was served
 */
export type CacheStatus = 'hit' | 'fresh' | 'stale';

export interface CacheResult {
  key: string;
  payload: JsonValue;
  status: CacheStatus;
  fetchedAt: Date;
  expiresAt: Date;
}

export interface CacheEntryStatus {
  fetchedAt: string;
  expiresAt: string;
  expired: boolean;
  ttlRemainingMs: number;
}
