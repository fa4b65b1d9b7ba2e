import { Injectable } from '@nestjs/common';
import { DatabaseService } from './database.service';
import type { IMessageRepository, Message, MessageRole } from './store.types';

type MessageRow = {
  id: number;
  role: MessageRole;
  content: string;
  created_at: string;
};

@Injectable()
export class SqliteMessageRepository implements IMessageRepository {
  constructor(private readonly database: DatabaseService) {}

  insert(role: MessageRole, content: string, createdAt: Date): Message {
    const result = this.database.run('message append', (db) =>
      db
        .prepare(
          'INSERT INTO messages (role, content, created_at) VALUES (?, ?, ?)',
        )
        .run(role, content, createdAt.toISOString()),
    );
    return {
      id: Number(result.lastInsertRowid),
      role,
      content,
      createdAt,
    };
  }

  findSince(since: Date): Message[] {
    const rows = this.database.run('message read', (db) =>
      db
        .prepare<[string], MessageRow>(
          `SELECT id, role, content, created_at
           FROM messages
           WHERE created_at >= ?
           ORDER BY created_at ASC, id ASC`,
        )
        .all(since.toISOString()),
    );
    return rows.map((row) => ({
      id: row.id,
      role: row.role,
      content: row.content,
      createdAt: new Date(row.created_at),
    }));
  }

  count(): number {
    const row = this.database.run('message count', (db) =>
      db
        .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM messages')
        .get(),
    );
    return row?.total ?? 0;
  }

  deleteAll(): number {
    const result = this.database.run('message clear', (db) =>
      db.prepare('DELETE FROM messages').run(),
    );
    return result.changes;
  }
}
