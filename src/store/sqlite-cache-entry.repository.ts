import { Injectable } from '@nestjs/common';
import type { JsonValue } from '../common/json';
import { DatabaseService } from './database.service';
import type { CacheEntry, ICacheEntryRepository } from './store.types';

type CacheEntryRow = {
  key: string;
  data: string;
  fetched_at: string;
  expires_at: string;
};

@Injectable()
export class SqliteCacheEntryRepository implements ICacheEntryRepository {
  constructor(private readonly database: DatabaseService) {}

  find(key: string): CacheEntry | null {
    const row = this.database.run('cache read', (db) =>
      db
        .prepare<[string], CacheEntryRow>(
          'SELECT key, data, fetched_at, expires_at FROM cache_entries WHERE key = ?',
        )
        .get(key),
    );
    return row ? this.mapToEntry(row) : null;
  }

  upsert(entry: CacheEntry): void {
    const data = JSON.stringify(entry.payload);
    this.database.run('cache write', (db) =>
      db
        .prepare(
          `INSERT INTO cache_entries (key, data, fetched_at, expires_at)
           VALUES (@key, @data, @fetchedAt, @expiresAt)
           ON CONFLICT(key) DO UPDATE SET
             data = excluded.data,
             fetched_at = excluded.fetched_at,
             expires_at = excluded.expires_at`,
        )
        .run({
          key: entry.key,
          data,
          fetchedAt: entry.fetchedAt.toISOString(),
          expiresAt: entry.expiresAt.toISOString(),
        }),
    );
  }

  delete(key: string): boolean {
    const result = this.database.run('cache delete', (db) =>
      db.prepare('DELETE FROM cache_entries WHERE key = ?').run(key),
    );
    return result.changes > 0;
  }

  deleteAll(): number {
    const result = this.database.run('cache clear', (db) =>
      db.prepare('DELETE FROM cache_entries').run(),
    );
    return result.changes;
  }

  findAll(): CacheEntry[] {
    const rows = this.database.run('cache scan', (db) =>
      db
        .prepare<[], CacheEntryRow>(
          'SELECT key, data, fetched_at, expires_at FROM cache_entries ORDER BY key',
        )
        .all(),
    );
    return rows.map((row) => this.mapToEntry(row));
  }

  private mapToEntry(row: CacheEntryRow): CacheEntry {
    const payload: JsonValue = this.database.run('cache decode', () =>
      JSON.parse(row.data),
    );
    return {
      key: row.key,
      payload,
      fetchedAt: new Date(row.fetched_at),
      expiresAt: new Date(row.expires_at),
    };
  }
}
