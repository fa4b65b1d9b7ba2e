import { ConfigService } from '@nestjs/config';
import type { Clock } from '../common/clock';
import { DatabaseService } from '../store/database.service';
import { SqliteCacheEntryRepository } from '../store/sqlite-cache-entry.repository';
import { SqliteMessageRepository } from '../store/sqlite-message.repository';

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current);
  }

  set(date: Date): void {
    this.current = new Date(date);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function createTestStore() {
  const database = new DatabaseService(
    new ConfigService({ ASSISTANT_DB_PATH: ':memory:' }),
  );
  return {
    database,
    cacheEntries: new SqliteCacheEntryRepository(database),
    messages: new SqliteMessageRepository(database),
  };
}

export const MINUTE_MS = 60 * 1000;
