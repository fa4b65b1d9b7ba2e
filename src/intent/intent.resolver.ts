import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ClassificationError, describeError } from '../common/errors';
import {
  ASSISTANT_EVENTS,
  type IntentClassifiedEvent,
} from '../events/assistant.events';
import {
  COMPLETION_GATEWAY,
  type CompletionGateway,
} from '../ollama/completion-gateway';
import {
  buildClassificationPrompt,
  CLASSIFICATION_SYSTEM_PROMPT,
} from './classification-prompt';
import { IntentQueryCache } from './intent-query.cache';
import {
  ClassificationResult,
  Intent,
  IntentScores,
  SCORABLE_INTENTS,
} from './intent.types';
import {
  TextClassifier,
  toClassificationResult,
  topConfidence,
} from './text-classifier';

const LABELS = new Map<string, Intent>([
  ['weather', Intent.WEATHER],
  ['events', Intent.EVENTS],
  ['event', Intent.EVENTS],
  ['todos', Intent.TODOS],
  ['todo', Intent.TODOS],
  ['refresh', Intent.REFRESH],
  ['unknown', Intent.UNKNOWN],
  ['none', Intent.UNKNOWN],
]);

/**
 * Hybrid intent detection: the keyword table answers when it is confident
 * enough, otherwise one few-shot completion call decides. Never throws.
 */
@Injectable()
export class IntentResolver {
  private readonly logger = new Logger(IntentResolver.name);
  private readonly fastPathThreshold: number;
  private readonly acceptanceThreshold: number;
  private readonly modelConfidence: number;
  readonly queryCache: IntentQueryCache;

  constructor(
    private readonly textClassifier: TextClassifier,
    private readonly config: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    @Optional()
    @Inject(COMPLETION_GATEWAY)
    private readonly gateway?: CompletionGateway,
  ) {
    this.fastPathThreshold = Number(
      this.config.get('INTENT_FAST_PATH_THRESHOLD') ?? 0.7,
    );
    this.acceptanceThreshold = Number(
      this.config.get('INTENT_ACCEPTANCE_THRESHOLD') ?? 0.3,
    );
    this.modelConfidence = Number(
      this.config.get('INTENT_MODEL_CONFIDENCE') ?? 0.8,
    );
    this.queryCache = new IntentQueryCache(
      Number(this.config.get('INTENT_QUERY_CACHE_SIZE') ?? 500),
    );
  }

  async classify(utterance: string): Promise<ClassificationResult> {
    const text = utterance.trim();
    const ruleScores = this.textClassifier.score(text);
    const ruleResult = toClassificationResult(
      ruleScores,
      'rule',
      false,
      this.acceptanceThreshold,
    );

    if (!text || topConfidence(ruleResult) >= this.fastPathThreshold) {
      return this.emitClassified(text, ruleResult, false);
    }

    const cached = this.queryCache.get(text);
    if (cached) {
      this.logger.debug(`Query cache hit: "${text.slice(0, 30)}"`);
      return this.emitClassified(text, this.merge(ruleScores, cached, true), false);
    }

    if (!this.gateway) {
      return this.emitClassified(text, ruleResult, false);
    }

    try {
      const modelScores = await this.classifyWithModel(text, this.gateway);
      if (Object.values(modelScores).some((score) => (score ?? 0) > 0)) {
        this.queryCache.store(text, modelScores);
      }
      return this.emitClassified(
        text,
        this.merge(ruleScores, modelScores, false),
        false,
      );
    } catch (error) {
      this.logger.warn(
        `Model classification failed, keeping rule result: ${describeError(error)}`,
      );
      return this.emitClassified(text, ruleResult, true);
    }
  }

  /**
   * One few-shot completion call. Throws ClassificationError on gateway
   * failure or when the reply cannot be read as scores or labels.
   */
  async classifyWithModel(
    text: string,
    gateway: CompletionGateway,
  ): Promise<IntentScores> {
    let raw: string;
    try {
      raw = await gateway.complete(buildClassificationPrompt(text), [], {
        system: CLASSIFICATION_SYSTEM_PROMPT,
        model: 'small',
      });
    } catch (error) {
      throw new ClassificationError('Completion gateway failed', {
        cause: error,
      });
    }
    return this.parseReply(raw);
  }

  /**
   * Reads a model reply as either a JSON object of probabilities or a plain
   * list of intent labels.
   *
   * Handles:
   * - <think>…</think> blocks
   * - ```json … ``` fenced code blocks, with or without language tag
   * - prose around the JSON object
   */
  parseReply(reply: string): IntentScores {
    const cleaned = reply.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();

    const json = this.extractJSON(cleaned);
    if (json) return this.readProbabilities(json);

    const labels = cleaned.toLowerCase().match(/[a-z]+(?:-[a-z]+)?/g) ?? [];
    const known = labels.flatMap((label) => {
      const intent = LABELS.get(label);
      return intent ? [intent] : [];
    });
    if (known.length === 0) {
      throw new ClassificationError(
        `Unreadable classification reply: ${cleaned.slice(0, 200)}`,
      );
    }

    const scores: IntentScores = {};
    for (const intent of known) {
      if (intent !== Intent.UNKNOWN) scores[intent] = this.modelConfidence;
    }
    return scores;
  }

  private extractJSON(text: string): Record<string, unknown> | null {
    let candidate = text;

    const fencedMatch = /```(?:json)?\s*([\s\S]*?)```/i.exec(candidate);
    if (fencedMatch) {
      candidate = fencedMatch[1];
    }

    const start = candidate.indexOf('{');
    const end = candidate.lastIndexOf('}');
    if (start === -1 || end <= start) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate.slice(start, end + 1));
    } catch {
      throw new ClassificationError(
        `Classification reply is not valid JSON: ${candidate.slice(0, 200)}`,
      );
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  private readProbabilities(json: Record<string, unknown>): IntentScores {
    const scores: IntentScores = {};
    for (const intent of SCORABLE_INTENTS) {
      const value = json[intent];
      if (typeof value === 'number' && value >= 0 && value <= 1) {
        scores[intent] = value;
      }
    }
    return scores;
  }

  private merge(
    ruleScores: IntentScores,
    modelScores: IntentScores,
    cacheHit: boolean,
  ): ClassificationResult {
    const combined: IntentScores = {};
    for (const intent of SCORABLE_INTENTS) {
      combined[intent] = Math.max(
        ruleScores[intent] ?? 0,
        modelScores[intent] ?? 0,
      );
    }
    return toClassificationResult(
      combined,
      'model',
      cacheHit,
      this.acceptanceThreshold,
    );
  }

  private emitClassified(
    utterance: string,
    result: ClassificationResult,
    gatewayFailed: boolean,
  ): ClassificationResult {
    this.eventEmitter.emit(ASSISTANT_EVENTS.INTENT_CLASSIFIED, {
      utterance,
      intents: result.intents.map((s) => s.intent),
      topConfidence: topConfidence(result),
      strategy: result.strategy,
      cacheHit: result.cacheHit,
      gatewayFailed,
    } satisfies IntentClassifiedEvent);
    return result;
  }
}
