import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { FreshnessCacheModule } from '../cache/freshness-cache.module';
import { CLOCK, systemClock } from '../common/clock';
import { validateEnv } from '../config/env.validation';
import { ContextModule } from '../context/context.module';
import { DOMAIN_FETCHERS } from '../context/context.types';
import { ConversationModule } from '../conversation/conversation.module';
import { DiagnosticsListener } from '../events/diagnostics.listener';
import { IntentModule } from '../intent/intent.module';
import { COMPLETION_GATEWAY } from '../ollama/completion-gateway';
import { OllamaModule } from '../ollama/ollama.module';
import { OllamaService } from '../ollama/ollama.service';
import { AssistantService } from './assistant.service';
import type { AssistantCoreOptions } from './assistant.types';

@Module({})
export class AssistantCoreModule {
  static forRoot(options: AssistantCoreOptions = {}): DynamicModule {
    const gatewayProviders: Provider[] =
      options.gateway === 'ollama'
        ? [{ provide: COMPLETION_GATEWAY, useExisting: OllamaService }]
        : options.gateway
          ? [{ provide: COMPLETION_GATEWAY, useValue: options.gateway }]
          : [];

    return {
      module: AssistantCoreModule,
      global: true,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          // `validate` only sees the environment; programmatic values are checked here.
          load: [() => ({ ...validateEnv(options.config ?? {}) })],
          validate: validateEnv,
        }),
        EventEmitterModule.forRoot({ wildcard: true }),
        OllamaModule,
        IntentModule,
        FreshnessCacheModule,
        ConversationModule,
        ContextModule,
      ],
      providers: [
        { provide: CLOCK, useValue: options.clock ?? systemClock },
        { provide: DOMAIN_FETCHERS, useValue: options.fetchers ?? {} },
        ...gatewayProviders,
        DiagnosticsListener,
        AssistantService,
      ],
      exports: [
        CLOCK,
        DOMAIN_FETCHERS,
        ...(gatewayProviders.length > 0 ? [COMPLETION_GATEWAY] : []),
        AssistantService,
        IntentModule,
        FreshnessCacheModule,
        ConversationModule,
        ContextModule,
      ],
    };
  }
}
