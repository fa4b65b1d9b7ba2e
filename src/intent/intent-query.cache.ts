import type { IntentScores } from './intent.types';

/**
 * Remembers model classifications by normalized utterance so repeated
 * questions skip the completion call. Insertion-ordered; the oldest entry is
 * evicted once `maxEntries` is reached.
 */
export class IntentQueryCache {
  private readonly entries = new Map<string, IntentScores>();

  constructor(private readonly maxEntries = 500) {}

  static normalize(utterance: string): string {
    return utterance.toLowerCase().trim().replace(/\s+/g, ' ');
  }

  get(utterance: string): IntentScores | undefined {
    return this.entries.get(IntentQueryCache.normalize(utterance));
  }

  store(utterance: string, scores: IntentScores): void {
    const key = IntentQueryCache.normalize(utterance);
    this.entries.delete(key);
    this.entries.set(key, { ...scores });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  get size(): number {
    return this.entries.size;
  }
}
