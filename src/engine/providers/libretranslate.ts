/**
 * LibreTranslate provider (self-hosted or public instance)
 */

import type {
  ITranslationProvider,
  ProviderConfig,
  TranslateOptions,
} from '../interfaces/translation-provider.js';

interface LibreTranslateResponse {
  translatedText: string;
}

function isLibreTranslateResponse(value: unknown): value is LibreTranslateResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'translatedText' in value &&
    typeof value.translatedText === 'string'
  );
}

function readErrorField(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string') {
    return value.error;
  }
  return undefined;
}

export class LibreTranslateProvider implements ITranslationProvider {
  readonly name = 'libretranslate';

  private baseUrl: string;
  private apiKey?: string;
  private fetchImpl: typeof fetch;

  constructor(config: ProviderConfig, fetchImpl: typeof fetch = fetch) {
    if (!config.baseUrl) {
      throw new Error('LibreTranslate base URL is required');
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey || undefined;
    this.fetchImpl = fetchImpl;
  }

  async translate(text: string, options: TranslateOptions): Promise<string> {
    const response = await this.fetchImpl(`${this.baseUrl}/translate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        q: text,
        source: options.sourceLanguage,
        target: options.targetLanguage,
        format: 'text',
        ...(this.apiKey ? { api_key: this.apiKey } : {}),
      }),
      signal: options.signal,
    });

    const data: unknown = await response.json().catch(() => null);

    if (!response.ok) {
      const detail = readErrorField(data) ?? response.statusText;
      throw new Error(`LibreTranslate HTTP ${response.status}: ${detail}`);
    }

    if (!isLibreTranslateResponse(data)) {
      throw new Error('LibreTranslate response has no translatedText');
    }

    return data.translatedText;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/languages`);
      return response.ok;
    } catch {
      return false;
    }
  }
}
