import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { FreshnessCacheService } from './freshness-cache.service';

@Module({
  imports: [StoreModule],
  providers: [FreshnessCacheService],
  exports: [FreshnessCacheService],
})
export class FreshnessCacheModule {}
