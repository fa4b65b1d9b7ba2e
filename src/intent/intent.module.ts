import { Module } from '@nestjs/common';
import { IntentResolver } from './intent.resolver';
import { TextClassifier } from './text-classifier';

@Module({
  providers: [TextClassifier, IntentResolver],
  exports: [TextClassifier, IntentResolver],
})
export class IntentModule {}
