import { IntentQueryCache } from './intent-query.cache';
import { Intent } from './intent.types';

describe('IntentQueryCache', () => {
  it('normalizes case and whitespace', () => {
    expect(IntentQueryCache.normalize('  Am I   FREE\tlater ')).toBe(
      'am i free later',
    );
  });

  it('finds entries stored under a differently spaced utterance', () => {
    const cache = new IntentQueryCache();
    cache.store('Anything on Thursday?', { [Intent.EVENTS]: 0.8 });

    expect(cache.get('  anything ON   thursday? ')).toEqual({
      [Intent.EVENTS]: 0.8,
    });
    expect(cache.get('anything on friday?')).toBeUndefined();
  });

  it('evicts the oldest entry beyond capacity', () => {
    const cache = new IntentQueryCache(2);
    cache.store('one', { [Intent.WEATHER]: 0.5 });
    cache.store('two', { [Intent.EVENTS]: 0.5 });
    cache.store('three', { [Intent.TODOS]: 0.5 });

    expect(cache.size).toBe(2);
    expect(cache.get('one')).toBeUndefined();
    expect(cache.get('three')).toEqual({ [Intent.TODOS]: 0.5 });
  });

  it('refreshes recency when an entry is stored again', () => {
    const cache = new IntentQueryCache(2);
    cache.store('one', { [Intent.WEATHER]: 0.5 });
    cache.store('two', { [Intent.EVENTS]: 0.5 });
    cache.store('one', { [Intent.WEATHER]: 0.6 });
    cache.store('three', { [Intent.TODOS]: 0.5 });

    expect(cache.get('two')).toBeUndefined();
    expect(cache.get('one')).toEqual({ [Intent.WEATHER]: 0.6 });
  });

  it('clears and reports the count', () => {
    const cache = new IntentQueryCache();
    cache.store('one', {});
    cache.store('two', {});

    expect(cache.clear()).toBe(2);
    expect(cache.size).toBe(0);
  });
});
