import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { ConversationService } from './conversation.service';

@Module({
  imports: [StoreModule],
  providers: [ConversationService],
  exports: [ConversationService],
})
export class ConversationModule {}
