import { Module } from '@nestjs/common';
import { FreshnessCacheModule } from '../cache/freshness-cache.module';
import { ConversationModule } from '../conversation/conversation.module';
import { TemporalModule } from '../temporal/temporal.module';
import { ContextAssemblerService } from './context-assembler.service';

@Module({
  imports: [FreshnessCacheModule, ConversationModule, TemporalModule],
  providers: [ContextAssemblerService],
  exports: [ContextAssemblerService],
})
export class ContextModule {}
