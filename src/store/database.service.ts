import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Database from 'better-sqlite3';
import { StoreError } from '../common/errors';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_messages_created_at ON messages(created_at);

  CREATE TABLE IF NOT EXISTS cache_entries (
    key TEXT PRIMARY KEY,
    data TEXT NOT NULL,
    fetched_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_cache_expires_at ON cache_entries(expires_at);
`;

/**
 * Owns the embedded SQLite handle shared by the cache and the conversation
 * ledger. Every statement goes through `run`, which maps driver failures to
 * StoreError.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  private readonly db: Database.Database;
  readonly path: string;

  constructor(config: ConfigService) {
    this.path = config.get<string>('ASSISTANT_DB_PATH') ?? 'data/assistant.db';

    try {
      if (this.path !== ':memory:') {
        mkdirSync(dirname(this.path), { recursive: true });
      }
      this.db = new Database(this.path);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      this.logger.error(`Opening database "${this.path}" failed`, error);
      throw new StoreError('open', error);
    }
    this.logger.log(`Database ready at "${this.path}"`);
  }

  run<T>(operation: string, work: (db: Database.Database) => T): T {
    try {
      return work(this.db);
    } catch (error) {
      this.logger.error(`Store ${operation} failed`, error);
      throw new StoreError(operation, error);
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  onModuleDestroy(): void {
    this.close();
  }
}
