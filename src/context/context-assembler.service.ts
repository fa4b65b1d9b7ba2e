import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { FreshnessCacheService } from '../cache/freshness-cache.service';
import { CLOCK, type Clock } from '../common/clock';
import { FetchError } from '../common/errors';
import {
  ConversationService,
  HOUR_MS,
} from '../conversation/conversation.service';
import {
  ASSISTANT_EVENTS,
  type ContextAssembledEvent,
} from '../events/assistant.events';
import type { ClassificationResult } from '../intent/intent.types';
import { TemporalService } from '../temporal/temporal.service';
import {
  DOMAIN_FETCHERS,
  type AssembleOptions,
  type ContextSection,
  type DomainDefinition,
  type DomainFetchers,
  type PromptPayload,
} from './context.types';
import { cacheKeyFor, DOMAIN_DEFINITIONS } from './domain-definitions';
import { compactJson } from './domain-summaries';
import { formatCurrentTime, PERSONA_PROMPT } from './persona-prompt';

/**
 * Builds the prompt payload for one turn: persona, recent history and the
 * cached data of every domain the classification asked for. Domains fail
 * independently; only a store failure aborts the whole assembly.
 */
@Injectable()
export class ContextAssemblerService {
  private readonly logger = new Logger(ContextAssemblerService.name);
  private readonly acceptanceThreshold: number;
  private readonly historyWindowMs: number;
  private readonly historyMaxMessages: number;
  private readonly fetchers: DomainFetchers;

  constructor(
    private readonly cache: FreshnessCacheService,
    private readonly conversation: ConversationService,
    private readonly temporal: TemporalService,
    private readonly config: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(CLOCK) private readonly clock: Clock,
    @Optional() @Inject(DOMAIN_FETCHERS) fetchers?: DomainFetchers,
  ) {
    this.acceptanceThreshold = Number(
      this.config.get('INTENT_ACCEPTANCE_THRESHOLD') ?? 0.3,
    );
    this.historyWindowMs =
      Number(this.config.get('HISTORY_WINDOW_HOURS') ?? 4) * HOUR_MS;
    this.historyMaxMessages = Number(
      this.config.get('HISTORY_MAX_MESSAGES') ?? 30,
    );
    this.fetchers = fetchers ?? {};
  }

  async assemble(
    classification: ClassificationResult,
    options: AssembleOptions = {},
  ): Promise<PromptPayload> {
    const now = this.clock.now();
    const forceRefresh =
      Boolean(options.forceRefresh) || classification.forceRefresh;
    const { day } = this.temporal.resolveDay(options.utterance ?? '', now);

    const requested = DOMAIN_DEFINITIONS.filter((domain) =>
      classification.intents.some(
        (s) =>
          s.intent === domain.intent &&
          s.confidence > 0 &&
          s.confidence >= this.acceptanceThreshold,
      ),
    );

    const sections = await Promise.all(
      requested.map((domain) =>
        this.loadSection(domain, day, now, forceRefresh),
      ),
    );
    const history = this.conversation.forContext(
      this.historyWindowMs,
      this.historyMaxMessages,
    );

    this.eventEmitter.emit(ASSISTANT_EVENTS.CONTEXT_ASSEMBLED, {
      sections: sections.map((s) => ({ key: s.key, status: s.status })),
      historyTurns: history.length,
      forceRefresh,
    } satisfies ContextAssembledEvent);

    return {
      system: this.buildSystemPrompt(now, sections),
      history,
      sections,
      forceRefresh,
      generatedAt: now.toISOString(),
    };
  }

  buildSystemPrompt(now: Date, sections: readonly ContextSection[]): string {
    const parts = [PERSONA_PROMPT, `CURRENT TIME: ${formatCurrentTime(now)}`];
    if (sections.length > 0) {
      parts.push(`CURRENT DATA:\n\n${sections.map((s) => s.text).join('\n\n')}`);
    }
    return parts.join('\n\n');
  }

  private async loadSection(
    domain: DomainDefinition,
    day: string,
    now: Date,
    forceRefresh: boolean,
  ): Promise<ContextSection> {
    const key = cacheKeyFor(domain, day);
    const heading = this.heading(domain, day, now);
    const factory = this.fetchers[domain.intent];

    if (!factory) {
      this.logger.warn(`No data source registered for ${domain.intent}`);
      return {
        intent: domain.intent,
        key,
        status: 'unavailable',
        text: `${heading}:\nUnavailable (no data source configured).`,
      };
    }

    const ttlMs =
      Number(this.config.get(domain.ttlConfigKey) ?? domain.defaultTtlSeconds) *
      1000;

    try {
      const result = await this.cache.get(
        key,
        ttlMs,
        () => factory({ day })(),
        forceRefresh,
      );
      const summary = domain.summarize(result.payload) ?? compactJson(result.payload);
      const note =
        result.status === 'stale'
          ? `\n(Note: this data may be out of date; last updated ${result.fetchedAt.toISOString()}.)`
          : '';
      return {
        intent: domain.intent,
        key,
        status: result.status,
        text: `${heading}:\n${summary}${note}`,
      };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      this.logger.warn(`Omitting ${key}: ${error.message}`);
      return {
        intent: domain.intent,
        key,
        status: 'unavailable',
        text: `${heading}:\nUnavailable right now (the data source could not be reached).`,
      };
    }
  }

  private heading(domain: DomainDefinition, day: string, now: Date): string {
    if (!domain.perDay) return domain.title;
    const label = this.temporal.relativeLabel(day, now);
    return label
      ? `${domain.title} FOR ${label} (${day})`
      : `${domain.title} FOR ${day}`;
  }
}
