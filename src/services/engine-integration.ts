/**
 * Engine Integration - builds engine objects from app config
 */

import {
  OpenAIProvider,
  LibreTranslateProvider,
  ItemTranslator,
  ConfigurationError,
  type ITranslationProvider,
} from '../engine/index.js';
import type { AppConfig } from '../config.js';

/**
 * Create the configured translation provider.
 * A missing key or URL is a start-up error.
 */
export function createProvider(config: AppConfig): ITranslationProvider {
  switch (config.provider) {
    case 'openai':
      if (!config.openai.apiKey) {
        throw new ConfigurationError('OpenAI API key is not configured (OPENAI_API_KEY)');
      }
      console.log(`[Engine] Provider: OpenAI (${config.openai.model})`);
      return new OpenAIProvider({
        apiKey: config.openai.apiKey,
        model: config.openai.model,
        baseUrl: config.openai.baseUrl,
        timeout: config.translation.timeoutMs,
      });

    case 'libretranslate':
      if (!config.libretranslate.url) {
        throw new ConfigurationError('LibreTranslate URL is not configured (LIBRETRANSLATE_URL)');
      }
      console.log(`[Engine] Provider: LibreTranslate (${config.libretranslate.url})`);
      return new LibreTranslateProvider({
        baseUrl: config.libretranslate.url,
        apiKey: config.libretranslate.apiKey,
      });
  }
}

export function createItemTranslator(
  config: AppConfig,
  provider: ITranslationProvider = createProvider(config)
): ItemTranslator {
  return new ItemTranslator({
    provider,
    cacheTtlMs: config.translation.cacheTtlMs,
    timeoutMs: config.translation.timeoutMs,
  });
}
