import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  ASSISTANT_EVENTS,
  type CacheFetchFailedEvent,
  type CacheHitEvent,
  type CacheRefreshedEvent,
  type CacheStaleServedEvent,
  type ContextAssembledEvent,
  type IntentClassifiedEvent,
  type MessageAppendedEvent,
} from './assistant.events';

const clip = (text: string, max = 60) =>
  `${text.slice(0, max)}${text.length > max ? '…' : ''}`;

@Injectable()
export class DiagnosticsListener {
  private readonly logger = new Logger('Diagnostics');

  @OnEvent(ASSISTANT_EVENTS.INTENT_CLASSIFIED)
  onIntentClassified(event: IntentClassifiedEvent) {
    const source =
      event.strategy === 'rule' ? 'rule' : event.cacheHit ? 'cache' : 'model';
    this.logger.log(
      `[intent.classified:${source}] "${clip(event.utterance)}" → [${event.intents.join(', ')}] (${event.topConfidence})${event.gatewayFailed ? ' gateway-failed' : ''}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CACHE_HIT)
  onCacheHit(event: CacheHitEvent) {
    this.logger.debug(`[cache.hit] key=${event.key} expiresAt=${event.expiresAt}`);
  }

  @OnEvent(ASSISTANT_EVENTS.CACHE_REFRESHED)
  onCacheRefreshed(event: CacheRefreshedEvent) {
    this.logger.log(
      `[cache.refreshed] key=${event.key}${event.forced ? ' (forced)' : ''} expiresAt=${event.expiresAt}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CACHE_STALE_SERVED)
  onCacheStaleServed(event: CacheStaleServedEvent) {
    this.logger.warn(
      `[cache.stale_served] key=${event.key} fetchedAt=${event.fetchedAt} reason="${clip(event.reason, 120)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CACHE_FETCH_FAILED)
  onCacheFetchFailed(event: CacheFetchFailedEvent) {
    this.logger.error(
      `[cache.fetch_failed] key=${event.key} reason="${clip(event.reason, 120)}"`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.MESSAGE_APPENDED)
  onMessageAppended(event: MessageAppendedEvent) {
    this.logger.debug(
      `[message.appended] id=${event.id} role=${event.role} length=${event.length}`,
    );
  }

  @OnEvent(ASSISTANT_EVENTS.CONTEXT_ASSEMBLED)
  onContextAssembled(event: ContextAssembledEvent) {
    const sections = event.sections.map((s) => `${s.key}:${s.status}`);
    this.logger.log(
      `[context.assembled] sections=[${sections.join(', ')}] history=${event.historyTurns}${event.forceRefresh ? ' (refresh)' : ''}`,
    );
  }
}
