export enum Intent {
  WEATHER = 'weather',
  EVENTS = 'events',
  TODOS = 'todos',
  REFRESH = 'refresh',
  UNKNOWN = 'unknown',
}

/** Intents that map to a cached data domain. */
export type DomainIntent = Intent.WEATHER | Intent.EVENTS | Intent.TODOS;

export const DOMAIN_INTENTS: readonly DomainIntent[] = [
  Intent.WEATHER,
  Intent.EVENTS,
  Intent.TODOS,
];

/** Every intent a classifier can score, in tie-break order. */
export const SCORABLE_INTENTS: readonly Intent[] = [
  Intent.WEATHER,
  Intent.EVENTS,
  Intent.TODOS,
  Intent.REFRESH,
];

export interface ScoredIntent {
  intent: Intent;
  confidence: number; // 0.0 - 1.0
}

export type ClassificationStrategy = 'rule' | 'model';

export interface ClassificationResult {
  /** Highest confidence first; `[{ UNKNOWN, 0 }]` when nothing scored. */
  intents: ScoredIntent[];
  strategy: ClassificationStrategy;
  cacheHit: boolean;
  /** REFRESH was detected: callers bypass cache freshness for this request. */
  forceRefresh: boolean;
}

export type IntentScores = Partial<Record<Intent, number>>;
