import { describe, it, expect } from 'vitest';
import { SessionHistoryStore, TranslationHistory, type NewHistoryEntry } from './history.js';

const sample = (sourceText: string): NewHistoryEntry => ({
  sourceText,
  targetLanguage: 'fr',
  targetLabel: 'French',
  translatedText: `fr:${sourceText}`,
});

describe('TranslationHistory', () => {
  it('keeps insertion order and lists newest first on demand', () => {
    const history = new TranslationHistory();
    history.append(sample('one'));
    history.append(sample('two'));

    expect(history.list().map(e => e.sourceText)).toEqual(['one', 'two']);
    expect(history.newestFirst().map(e => e.sourceText)).toEqual(['two', 'one']);
    expect(history.size).toBe(2);
  });

  it('stamps entries with an id and creation time', () => {
    const history = new TranslationHistory();
    const entry = history.append(sample('hello'), new Date('2024-03-01T10:00:00.000Z'));

    expect(entry.createdAt).toBe('2024-03-01T10:00:00.000Z');
    expect(history.get(entry.id)).toEqual(entry);
  });

  it('does not expose its internal list', () => {
    const history = new TranslationHistory();
    history.append(sample('hello'));

    history.list().pop();
    expect(history.size).toBe(1);
  });

  it('clears everything', () => {
    const history = new TranslationHistory();
    history.append(sample('hello'));
    history.clear();

    expect(history.list()).toEqual([]);
  });
});

describe('SessionHistoryStore', () => {
  it('keeps sessions apart', () => {
    const store = new SessionHistoryStore({ ttlMs: 1_000 });
    store.forSession('a').append(sample('for a'));

    expect(store.forSession('a').size).toBe(1);
    expect(store.forSession('b').size).toBe(0);
  });

  it('drops sessions left idle past the TTL', () => {
    let now = 0;
    const store = new SessionHistoryStore({ ttlMs: 1_000, now: () => now });
    store.forSession('a').append(sample('hello'));

    now = 900;
    expect(store.peek('a')?.size).toBe(1);
    store.forSession('a');

    now = 1_800;
    expect(store.peek('a')?.size).toBe(1);

    now = 3_000;
    expect(store.peek('a')).toBeUndefined();
  });
});
