import type { ContextSection } from '../context/context.types';
import type { ClassificationResult } from '../intent/intent.types';
import type { CompletionGateway } from '../ollama/completion-gateway';
import type { DomainFetchers } from '../context/context.types';
import type { Clock } from '../common/clock';

export interface AssistantCoreOptions {
  /** Per-domain fetcher factories supplied by the weather/calendar/task wrappers. */
  fetchers?: DomainFetchers;
  /**
   * Completion gateway. `'ollama'` uses the bundled Ollama client; omit it to
   * run rule-only classification with no response generation.
   */
  gateway?: CompletionGateway | 'ollama';
  /** Values merged under the environment, e.g. `{ ASSISTANT_DB_PATH: ':memory:' }`. */
  config?: Record<string, unknown>;
  clock?: Clock;
}

export interface AssistantResponse {
  answer: string;
  classification: ClassificationResult;
  sections: Array<Pick<ContextSection, 'key' | 'status'>>;
}
