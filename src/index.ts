import 'reflect-metadata';

export { AssistantCoreModule } from './assistant/assistant-core.module';
export { AssistantService } from './assistant/assistant.service';
export type {
  AssistantCoreOptions,
  AssistantResponse,
} from './assistant/assistant.types';

export { IntentResolver } from './intent/intent.resolver';
export { TextClassifier } from './intent/text-classifier';
export { IntentQueryCache } from './intent/intent-query.cache';
export { INTENT_PATTERNS, INTENT_PATTERN_TABLE } from './intent/intent.patterns';
export type { IntentPattern } from './intent/intent.patterns';
export { Intent, DOMAIN_INTENTS } from './intent/intent.types';
export type {
  ClassificationResult,
  ClassificationStrategy,
  DomainIntent,
  ScoredIntent,
} from './intent/intent.types';

export { FreshnessCacheService } from './cache/freshness-cache.service';
export type {
  CacheEntryStatus,
  CacheResult,
  CacheStatus,
  DataFetcher,
} from './cache/cache.types';

export { ConversationService, HOUR_MS } from './conversation/conversation.service';
export type { Message, MessageRole, CacheEntry } from './store/store.types';

export { ContextAssemblerService } from './context/context-assembler.service';
export { DOMAIN_FETCHERS } from './context/context.types';
export type {
  ContextSection,
  DomainFetcherFactory,
  DomainFetchers,
  DomainScope,
  PromptPayload,
} from './context/context.types';

export { COMPLETION_GATEWAY } from './ollama/completion-gateway';
export type {
  ChatTurn,
  CompletionGateway,
  CompletionOptions,
} from './ollama/completion-gateway';
export { OllamaService } from './ollama/ollama.service';

export { CLOCK } from './common/clock';
export type { Clock } from './common/clock';
export type { JsonValue } from './common/json';
export {
  ClassificationError,
  CompletionProviderError,
  FetchError,
  StoreError,
} from './common/errors';
export { ASSISTANT_EVENTS } from './events/assistant.events';
