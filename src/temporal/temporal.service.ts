import { Injectable, Logger } from '@nestjs/common';
import * as chrono from 'chrono-node';
import type { RelativeDayLabel, ResolvedDay } from './temporal.types';

@Injectable()
export class TemporalService {
  private readonly logger = new Logger(TemporalService.name);

  /**
   * Picks the calendar day an utterance is about. Only expressions that fix a
   * day ("tomorrow", "on Friday", "March 3rd") count; a bare time such as
   * "at 3pm" keeps the reference day.
   */
  resolveDay(text: string, referenceDate: Date): ResolvedDay {
    const results = chrono.en.parse(text, referenceDate, { forwardDate: true });
    const dated = results.find(
      (r) => r.start.isCertain('day') || r.start.isCertain('weekday'),
    );

    if (!dated) {
      this.logger.debug(`No day expression found in: "${text}"`);
      return { day: this.dayKey(referenceDate) };
    }
    this.logger.debug(
      `Day expression found: "${dated.text}" → ${dated.start.date().toISOString()}`,
    );
    return { day: this.dayKey(dated.start.date()), expression: dated.text };
  }

  /** Local calendar day as YYYY-MM-DD. */
  dayKey(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
  }

  relativeLabel(day: string, referenceDate: Date): RelativeDayLabel | null {
    if (day === this.dayKey(referenceDate)) return 'TODAY';

    const tomorrow = new Date(referenceDate);
    tomorrow.setDate(tomorrow.getDate() + 1);
    if (day === this.dayKey(tomorrow)) return 'TOMORROW';

    return null;
  }
}
