import { Intent } from '../intent/intent.types';
import type { DomainDefinition } from './context.types';
import {
  summarizeEvents,
  summarizeTodos,
  summarizeWeather,
} from './domain-summaries';

export const DOMAIN_DEFINITIONS: readonly DomainDefinition[] = [
  {
    intent: Intent.WEATHER,
    title: 'WEATHER',
    perDay: false,
    ttlConfigKey: 'WEATHER_TTL_SECONDS',
    defaultTtlSeconds: 1800,
    summarize: summarizeWeather,
  },
  {
    intent: Intent.EVENTS,
    title: 'CALENDAR EVENTS',
    perDay: true,
    ttlConfigKey: 'EVENTS_TTL_SECONDS',
    defaultTtlSeconds: 300,
    summarize: summarizeEvents,
  },
  {
    intent: Intent.TODOS,
    title: 'TASKS',
    perDay: true,
    ttlConfigKey: 'TODOS_TTL_SECONDS',
    defaultTtlSeconds: 300,
    summarize: summarizeTodos,
  },
];

export function cacheKeyFor(domain: DomainDefinition, day: string): string {
  return domain.perDay ? `${domain.intent}:${day}` : domain.intent;
}
