import { Intent } from './intent.types';

export const INTENT_PATTERN_TABLE = Symbol('INTENT_PATTERN_TABLE');

export interface IntentPattern {
  intent: Intent;
  pattern: RegExp;
  /** Confidence for a single trigger hit. */
  confidence: number;
  /** Confidence when the pattern hits two or more times. */
  repeatedConfidence: number;
}

const triggers = (...terms: string[]) =>
  new RegExp(`\\b(?:${terms.join('|')})\\b`, 'gi');

/**
 * Keyword table driving the rule classifier. Adding a domain means adding a
 * row here; the classifier loop never changes.
 */
export const INTENT_PATTERNS: readonly IntentPattern[] = [
  {
    intent: Intent.WEATHER,
    pattern: triggers(
      'weather',
      'temperature',
      'rain',
      'forecast',
      'cold',
      'hot',
      'sunny',
      'cloudy',
      'umbrella',
      'degrees',
      'jacket',
    ),
    confidence: 0.7,
    repeatedConfidence: 0.9,
  },
  {
    intent: Intent.EVENTS,
    pattern: triggers(
      'calendar',
      'meeting',
      'event',
      'schedule',
      'appointment',
      'busy',
      'free',
      'available',
    ),
    confidence: 0.7,
    repeatedConfidence: 0.9,
  },
  {
    intent: Intent.TODOS,
    pattern: triggers('todos?', 'to-do', 'tasks?', 'reminder', 'checklist'),
    confidence: 0.7,
    repeatedConfidence: 0.9,
  },
  {
    intent: Intent.REFRESH,
    pattern: triggers(
      'refresh',
      'update',
      'latest',
      'check again',
      'refetch',
      'reload',
    ),
    confidence: 0.7,
    repeatedConfidence: 0.9,
  },
];
