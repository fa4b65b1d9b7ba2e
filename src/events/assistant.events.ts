export const ASSISTANT_EVENTS = {
  INTENT_CLASSIFIED: 'intent.classified',
  CACHE_HIT: 'cache.hit',
  CACHE_REFRESHED: 'cache.refreshed',
  CACHE_STALE_SERVED: 'cache.stale_served',
  CACHE_FETCH_FAILED: 'cache.fetch_failed',
  MESSAGE_APPENDED: 'message.appended',
  CONTEXT_ASSEMBLED: 'context.assembled',
} as const;

// ── Intent events ─────────────────────────────────────────────────────────────

export interface IntentClassifiedEvent {
  utterance: string;
  intents: string[]; // Intent values, highest confidence first
  topConfidence: number;
  strategy: 'rule' | 'model';
  cacheHit: boolean;
  gatewayFailed: boolean;
}

// ── Cache events ──────────────────────────────────────────────────────────────

export interface CacheHitEvent {
  key: string;
  expiresAt: string;
}

export interface CacheRefreshedEvent {
  key: string;
  forced: boolean;
  expiresAt: string;
}

export interface CacheStaleServedEvent {
  key: string;
  fetchedAt: string;
  reason: string;
}

export interface CacheFetchFailedEvent {
  key: string;
  reason: string;
}

// ── Conversation / context events ─────────────────────────────────────────────

export interface MessageAppendedEvent {
  id: number;
  role: 'user' | 'assistant';
  length: number;
}

export interface ContextAssembledEvent {
  sections: Array<{ key: string; status: string }>;
  historyTurns: number;
  forceRefresh: boolean;
}
