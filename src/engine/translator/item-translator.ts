/**
 * Per-Item Translator
 *
 * Wraps a provider with a (text, target) TTL cache and a per-call timeout.
 * translateItem() never throws: failures become error rows.
 */

import type { ITranslationProvider } from '../interfaces/translation-provider.js';
import type { TargetLanguage, TranslationResult } from '../types/common.js';
import { SOURCE_LANGUAGE, isTargetLanguage } from '../types/common.js';
import { TtlCache } from '../cache/ttl-cache.js';
import { UnsupportedLanguageError, toErrorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';

export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour
export const DEFAULT_TIMEOUT_MS = 15_000;

export interface ItemTranslatorOptions {
  provider: ITranslationProvider;
  cacheTtlMs?: number;
  timeoutMs?: number;
  cache?: TtlCache<string, string>;
}

export interface ItemTranslatorStats {
  cacheHits: number;
  providerCalls: number;
  failures: number;
}

/**
 * Marker written in place of a translation when an item fails
 */
export function formatItemError(message: string): string {
  return `[ERROR: ${message}]`;
}

export function cacheKey(text: string, target: TargetLanguage): string {
  return `${target}\u0000${text}`;
}

export class ItemTranslator {
  private provider: ITranslationProvider;
  private cache: TtlCache<string, string>;
  private pending = new Map<string, Promise<string>>();
  private timeoutMs: number;
  private stats: ItemTranslatorStats = { cacheHits: 0, providerCalls: 0, failures: 0 };

  constructor(options: ItemTranslatorOptions) {
    this.provider = options.provider;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.cache = options.cache ?? new TtlCache({ ttlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS });
  }

  get providerName(): string {
    return this.provider.name;
  }

  get cacheTtlMs(): number {
    return this.cache.ttl;
  }

  getStats(): ItemTranslatorStats {
    return { ...this.stats };
  }

  /**
   * Translate trimmed, non-empty English text. Throws on provider failure.
   */
  async translate(text: string, target: TargetLanguage): Promise<string> {
    if (!isTargetLanguage(target)) {
      throw new UnsupportedLanguageError(String(target));
    }

    const key = cacheKey(text, target);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.stats.cacheHits++;
      return cached;
    }

    // Concurrent requests for the same pair share one provider call
    const inFlight = this.pending.get(key);
    if (inFlight) {
      this.stats.cacheHits++;
      return inFlight;
    }

    const call = this.callProvider(text, target, key);
    this.pending.set(key, call);
    try {
      return await call;
    } finally {
      this.pending.delete(key);
    }
  }

  private async callProvider(text: string, target: TargetLanguage, key: string): Promise<string> {
    this.stats.providerCalls++;
    const translated = await withTimeout(
      signal =>
        this.provider.translate(text, {
          sourceLanguage: SOURCE_LANGUAGE,
          targetLanguage: target,
          signal,
        }),
      this.timeoutMs
    );

    this.cache.set(key, translated);
    return translated;
  }

  /**
   * Translate one batch item, capturing any failure in the result
   */
  async translateItem(text: string, target: TargetLanguage): Promise<TranslationResult> {
    try {
      const translatedText = await this.translate(text, target);
      return {
        originalText: text,
        translatedText,
        targetLanguage: target,
        succeeded: true,
      };
    } catch (error) {
      const detail = toErrorMessage(error);
      this.stats.failures++;
      console.warn(`[Translate] ⚠️ Item failed (${target}): ${detail}`);
      return {
        originalText: text,
        translatedText: formatItemError(detail),
        targetLanguage: target,
        succeeded: false,
        errorDetail: detail,
      };
    }
  }
}
