/**
 * Session history of single translations
 *
 * TranslationHistory is a plain ordered list owned by its caller.
 * SessionHistoryStore keeps one list per session, in memory only;
 * idle sessions expire.
 */

import { randomUUID } from 'crypto';
import { TtlCache, type TargetLanguage } from '../engine/index.js';

export interface HistoryEntry {
  id: string;
  sourceText: string;
  targetLanguage: TargetLanguage;
  targetLabel: string;
  translatedText: string;
  createdAt: string; // ISO timestamp
}

export type NewHistoryEntry = Omit<HistoryEntry, 'id' | 'createdAt'>;

export class TranslationHistory {
  private entries: HistoryEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  append(entry: NewHistoryEntry, now: Date = new Date()): HistoryEntry {
    const stored: HistoryEntry = {
      ...entry,
      id: randomUUID(),
      createdAt: now.toISOString(),
    };
    this.entries.push(stored);
    return stored;
  }

  get(id: string): HistoryEntry | undefined {
    return this.entries.find(e => e.id === id);
  }

  /**
   * Insertion order
   */
  list(): HistoryEntry[] {
    return [...this.entries];
  }

  newestFirst(): HistoryEntry[] {
    return [...this.entries].reverse();
  }

  clear(): void {
    this.entries = [];
  }
}

export class SessionHistoryStore {
  private sessions: TtlCache<string, TranslationHistory>;

  constructor(options: { ttlMs: number; now?: () => number }) {
    this.sessions = new TtlCache({ ttlMs: options.ttlMs, now: options.now });
  }

  /**
   * History for a session, created on first use.
   * Every access restarts the session's idle timer.
   */
  forSession(sessionId: string): TranslationHistory {
    const history = this.sessions.get(sessionId) ?? new TranslationHistory();
    this.sessions.set(sessionId, history);
    return history;
  }

  /**
   * Existing history without creating or refreshing one
   */
  peek(sessionId: string): TranslationHistory | undefined {
    return this.sessions.get(sessionId);
  }
}
