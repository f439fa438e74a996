import { describe, it, expect } from 'vitest';
import { createProvider, createItemTranslator } from './engine-integration.js';
import { loadConfig } from '../config.js';
import { ConfigurationError, LibreTranslateProvider, OpenAIProvider } from '../engine/index.js';
import { FakeProvider, silenceConsole } from '../test-utils/fake-provider.js';

describe('createProvider', () => {
  it('builds the OpenAI provider when a key is set', () => {
    silenceConsole();
    const provider = createProvider(loadConfig({ OPENAI_API_KEY: 'test-key' }));
    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.name).toBe('openai');
  });

  it('builds the LibreTranslate provider when selected', () => {
    silenceConsole();
    const provider = createProvider(
      loadConfig({ TRANSLATION_PROVIDER: 'libretranslate', LIBRETRANSLATE_URL: 'http://localhost:5000' })
    );
    expect(provider).toBeInstanceOf(LibreTranslateProvider);
  });

  it('rejects a provider without credentials', () => {
    expect(() => createProvider(loadConfig({}))).toThrow(ConfigurationError);
    expect(() => createProvider(loadConfig({ TRANSLATION_PROVIDER: 'libretranslate' }))).toThrow(
      'LibreTranslate URL is not configured (LIBRETRANSLATE_URL)'
    );
  });
});

describe('createItemTranslator', () => {
  it('applies the configured cache window to the given provider', () => {
    const translator = createItemTranslator(loadConfig({ CACHE_TTL_SECONDS: '120' }), new FakeProvider());
    expect(translator.providerName).toBe('fake');
    expect(translator.cacheTtlMs).toBe(120_000);
  });
});
