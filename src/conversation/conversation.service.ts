import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CLOCK, type Clock } from '../common/clock';
import {
  ASSISTANT_EVENTS,
  type MessageAppendedEvent,
} from '../events/assistant.events';
import type { ChatTurn } from '../ollama/completion-gateway';
import {
  MESSAGE_REPOSITORY,
  type IMessageRepository,
  type Message,
} from '../store/store.types';
import { AppendMessageDto } from './conversation.dto';

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Append-only conversation history. Readers choose a trailing time window;
 * nothing is expired or deleted here.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);

  constructor(
    @Inject(MESSAGE_REPOSITORY)
    private readonly messages: IMessageRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Stores one message stamped with the current time.
   * Rejects any role other than `user` / `assistant` with BadRequestException.
   */
  append(role: unknown, content: unknown): Message {
    const dto = plainToInstance(AppendMessageDto, { role, content });
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const details = errors
        .map((e) => Object.values(e.constraints ?? {}).join(', '))
        .join('; ');
      throw new BadRequestException(`Invalid message: ${details}`);
    }

    const message = this.messages.insert(dto.role, dto.content, this.clock.now());
    this.logger.debug(`Stored ${message.role} message (id=${message.id})`);
    this.eventEmitter.emit(ASSISTANT_EVENTS.MESSAGE_APPENDED, {
      id: message.id,
      role: message.role,
      length: message.content.length,
    } satisfies MessageAppendedEvent);
    return message;
  }

  /** Messages created within `windowMs` of now, oldest first. */
  recent(windowMs: number): Message[] {
    const since = new Date(this.clock.now().getTime() - windowMs);
    const messages = this.messages.findSince(since);
    this.logger.debug(
      `Retrieved ${messages.length} messages from the last ${windowMs}ms`,
    );
    return messages;
  }

  /** The newest `maxMessages` of the window, reduced to chat turns. */
  forContext(windowMs: number, maxMessages: number): ChatTurn[] {
    const messages = this.recent(windowMs);
    const kept = messages.length > maxMessages ? messages.slice(-maxMessages) : messages;
    return kept.map((m) => ({ role: m.role, content: m.content }));
  }

  count(): number {
    return this.messages.count();
  }

  clear(): number {
    const count = this.messages.deleteAll();
    this.logger.log(`Cleared ${count} messages from history`);
    return count;
  }
}
