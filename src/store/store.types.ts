import type { JsonValue } from '../common/json';

export const CACHE_ENTRY_REPOSITORY = Symbol('CACHE_ENTRY_REPOSITORY');
export const MESSAGE_REPOSITORY = Symbol('MESSAGE_REPOSITORY');

export type MessageRole = 'user' | 'assistant';

export const MESSAGE_ROLES: readonly MessageRole[] = ['user', 'assistant'];

export interface CacheEntry {
  key: string;
  payload: JsonValue;
  fetchedAt: Date;
  expiresAt: Date;
}

export interface Message {
  id: number;
  role: MessageRole;
  content: string;
  createdAt: Date;
}

export interface ICacheEntryRepository {
  find(key: string): CacheEntry | null;
  /** Insert or overwrite the row for `entry.key` in a single statement. */
  upsert(entry: CacheEntry): void;
  delete(key: string): boolean;
  deleteAll(): number;
  findAll(): CacheEntry[];
}

export interface IMessageRepository {
  insert(role: MessageRole, content: string, createdAt: Date): Message;
  /** Messages created at or after `since`, oldest first, insertion order on ties. */
  findSince(since: Date): Message[];
  count(): number;
  deleteAll(): number;
}
