import { Inject, Injectable, Optional } from '@nestjs/common';
import {
  INTENT_PATTERNS,
  INTENT_PATTERN_TABLE,
  type IntentPattern,
} from './intent.patterns';
import {
  ClassificationResult,
  Intent,
  IntentScores,
  SCORABLE_INTENTS,
  ScoredIntent,
} from './intent.types';

/**
 * Deterministic keyword classifier. Pure: no I/O, never throws, same input
 * always gives the same result.
 */
@Injectable()
export class TextClassifier {
  private readonly patterns: readonly IntentPattern[];

  constructor(
    @Optional()
    @Inject(INTENT_PATTERN_TABLE)
    patterns?: readonly IntentPattern[],
  ) {
    // Hits are counted with matchAll, which needs the global flag.
    this.patterns = (patterns ?? INTENT_PATTERNS).map((entry) =>
      entry.pattern.global
        ? entry
        : { ...entry, pattern: new RegExp(entry.pattern.source, `${entry.pattern.flags}g`) },
    );
  }

  classify(utterance: string): ClassificationResult {
    return toClassificationResult(this.score(utterance), 'rule', false, 0);
  }

  score(utterance: string): IntentScores {
    const scores: IntentScores = {};
    if (!utterance.trim()) return scores;

    for (const entry of this.patterns) {
      const hits = Array.from(utterance.matchAll(entry.pattern)).length;
      if (hits === 0) continue;
      const confidence = hits > 1 ? entry.repeatedConfidence : entry.confidence;
      scores[entry.intent] = Math.max(scores[entry.intent] ?? 0, confidence);
    }
    return scores;
  }
}

/** Orders scores into a result; REFRESH at or above `refreshThreshold` forces refresh. */
export function toClassificationResult(
  scores: IntentScores,
  strategy: ClassificationResult['strategy'],
  cacheHit: boolean,
  refreshThreshold: number,
): ClassificationResult {
  const intents: ScoredIntent[] = SCORABLE_INTENTS.flatMap((intent) => {
    const confidence = scores[intent] ?? 0;
    return confidence > 0 ? [{ intent, confidence }] : [];
  });
  // Array#sort is stable, so equal confidences keep table order.
  intents.sort((a, b) => b.confidence - a.confidence);

  const refresh = scores[Intent.REFRESH] ?? 0;
  return {
    intents:
      intents.length > 0 ? intents : [{ intent: Intent.UNKNOWN, confidence: 0 }],
    strategy,
    cacheHit,
    forceRefresh: refresh > 0 && refresh >= refreshThreshold,
  };
}

export function topConfidence(result: ClassificationResult): number {
  return result.intents[0]?.confidence ?? 0;
}
