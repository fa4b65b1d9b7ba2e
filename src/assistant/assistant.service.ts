import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { CacheResult, DataFetcher } from '../cache/cache.types';
import { FreshnessCacheService } from '../cache/freshness-cache.service';
import { CompletionProviderError } from '../common/errors';
import { ContextAssemblerService } from '../context/context-assembler.service';
import type { PromptPayload } from '../context/context.types';
import { ConversationService } from '../conversation/conversation.service';
import { IntentResolver } from '../intent/intent.resolver';
import type { ClassificationResult } from '../intent/intent.types';
import {
  COMPLETION_GATEWAY,
  type CompletionGateway,
} from '../ollama/completion-gateway';
import type { Message } from '../store/store.types';
import type { AssistantResponse } from './assistant.types';

/**
 * Entry point for the route layer: one method per operation the core
 * exposes, plus `respond` for a full conversational turn.
 */
@Injectable()
export class AssistantService {
  private readonly logger = new Logger(AssistantService.name);

  constructor(
    private readonly intentResolver: IntentResolver,
    private readonly cache: FreshnessCacheService,
    private readonly conversation: ConversationService,
    private readonly contextAssembler: ContextAssemblerService,
    @Optional()
    @Inject(COMPLETION_GATEWAY)
    private readonly gateway?: CompletionGateway,
  ) {}

  async classify(utterance: string): Promise<ClassificationResult> {
    return this.intentResolver.classify(utterance);
  }

  async cached(
    key: string,
    ttlMs: number,
    fetcher: DataFetcher,
    forceRefresh = false,
  ): Promise<CacheResult> {
    return this.cache.get(key, ttlMs, fetcher, forceRefresh);
  }

  remember(role: unknown, content: unknown): Message {
    return this.conversation.append(role, content);
  }

  history(windowMs: number): Message[] {
    return this.conversation.recent(windowMs);
  }

  async assembleContext(
    utterance: string,
    forceRefresh = false,
  ): Promise<PromptPayload> {
    const classification = await this.intentResolver.classify(utterance);
    return this.contextAssembler.assemble(classification, {
      utterance,
      forceRefresh,
    });
  }

  /**
   * Full turn: classify, assemble, ask the gateway, then record the user
   * message and the answer. Nothing is recorded when the completion fails.
   */
  async respond(utterance: string): Promise<AssistantResponse> {
    if (!this.gateway) {
      throw new CompletionProviderError('No completion gateway configured');
    }

    const classification = await this.intentResolver.classify(utterance);
    const payload = await this.contextAssembler.assemble(classification, {
      utterance,
    });

    const answer = await this.gateway.complete(utterance, payload.history, {
      system: payload.system,
    });
    this.conversation.append('user', utterance);
    this.conversation.append('assistant', answer);

    this.logger.log(
      `"${utterance.slice(0, 60)}" → ${classification.intents.map((s) => s.intent).join(', ')} (${classification.strategy})`,
    );

    return {
      answer,
      classification,
      sections: payload.sections.map((s) => ({ key: s.key, status: s.status })),
    };
  }
}
