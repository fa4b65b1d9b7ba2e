import { Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { SqliteCacheEntryRepository } from './sqlite-cache-entry.repository';
import { SqliteMessageRepository } from './sqlite-message.repository';
import { CACHE_ENTRY_REPOSITORY, MESSAGE_REPOSITORY } from './store.types';

@Module({
  providers: [
    DatabaseService,
    { provide: CACHE_ENTRY_REPOSITORY, useClass: SqliteCacheEntryRepository },
    { provide: MESSAGE_REPOSITORY, useClass: SqliteMessageRepository },
  ],
  exports: [DatabaseService, CACHE_ENTRY_REPOSITORY, MESSAGE_REPOSITORY],
})
export class StoreModule {}
