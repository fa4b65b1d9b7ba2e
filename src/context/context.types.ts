import type { DataFetcher } from '../cache/cache.types';
import type { JsonValue } from '../common/json';
import type { DomainIntent } from '../intent/intent.types';
import type { ChatTurn } from '../ollama/completion-gateway';

export const DOMAIN_FETCHERS = Symbol('DOMAIN_FETCHERS');

export interface DomainScope {
  /** Local calendar day the request is about, YYYY-MM-DD */
  day: string;
}

/** Builds the zero-argument fetcher for one domain and day. */
export type DomainFetcherFactory = (scope: DomainScope) => DataFetcher;

export type DomainFetchers = Partial<Record<DomainIntent, DomainFetcherFactory>>;

export interface DomainDefinition {
  intent: DomainIntent;
  title: string;
  /** Keys carry the day (`events:2026-10-18`) instead of the bare domain. */
  perDay: boolean;
  ttlConfigKey: string;
  defaultTtlSeconds: number;
  /** Compact prompt text, or null when the payload has an unexpected shape. */
  summarize(payload: JsonValue): string | null;
}

export type SectionStatus = 'hit' | 'fresh' | 'stale' | 'unavailable';

export interface ContextSection {
  intent: DomainIntent;
  key: string;
  status: SectionStatus;
  text: string;
}

export interface PromptPayload {
  system: string;
  history: ChatTurn[];
  sections: ContextSection[];
  forceRefresh: boolean;
  generatedAt: string;
}

export interface AssembleOptions {
  utterance?: string;
  forceRefresh?: boolean;
}
