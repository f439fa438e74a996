import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig, hasProvider } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(config.port).toBe(3000);
    expect(config.provider).toBe('openai');
    expect(config.openai).toEqual({ apiKey: 'test-key', model: 'gpt-4o-mini', baseUrl: undefined });
    expect(config.translation).toEqual({ timeoutMs: 15000, cacheTtlMs: 3_600_000 });
    expect(config.batch).toEqual({ concurrency: 1, maxFileSizeBytes: 5 * 1024 * 1024 });
    expect(config.session.ttlMs).toBe(120 * 60 * 1000);
  });

  it('reads the LibreTranslate settings', () => {
    const config = loadConfig({
      TRANSLATION_PROVIDER: 'LibreTranslate',
      LIBRETRANSLATE_URL: 'http://localhost:5000',
      CACHE_TTL_SECONDS: '60',
      BATCH_CONCURRENCY: '4',
    });

    expect(config.provider).toBe('libretranslate');
    expect(config.libretranslate.url).toBe('http://localhost:5000');
    expect(config.translation.cacheTtlMs).toBe(60_000);
    expect(config.batch.concurrency).toBe(4);
    expect(hasProvider(config)).toBe(true);
  });

  it('rounds a fractional upload limit down to whole bytes', () => {
    expect(loadConfig({ MAX_UPLOAD_MB: '0.3' }).batch.maxFileSizeBytes).toBe(314572);
    expect(loadConfig({ MAX_UPLOAD_MB: '0.00001' }).batch.maxFileSizeBytes).toBe(10);
  });
});

describe('validateConfig', () => {
  it('accepts a configured OpenAI setup', () => {
    expect(validateConfig(loadConfig({ OPENAI_API_KEY: 'test-key' }))).toEqual({ valid: true, errors: [] });
  });

  it('requires the key of the selected provider', () => {
    const result = validateConfig(loadConfig({}));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['OPENAI_API_KEY is required when TRANSLATION_PROVIDER=openai']);
  });

  it('rejects bad numbers', () => {
    const result = validateConfig(
      loadConfig({ OPENAI_API_KEY: 'test-key', TRANSLATION_TIMEOUT_MS: 'soon', BATCH_CONCURRENCY: '0' })
    );

    expect(result.errors).toEqual([
      'TRANSLATION_TIMEOUT_MS must be a positive number',
      'BATCH_CONCURRENCY must be at least 1',
    ]);
  });

  it('rejects an upload limit below one byte', () => {
    const result = validateConfig(loadConfig({ OPENAI_API_KEY: 'test-key', MAX_UPLOAD_MB: '0.0000001' }));

    expect(result.errors).toEqual(['MAX_UPLOAD_MB must allow at least one byte']);
  });

  it('needs an http URL for LibreTranslate', () => {
    const result = validateConfig(
      loadConfig({ TRANSLATION_PROVIDER: 'libretranslate', LIBRETRANSLATE_URL: 'localhost:5000' })
    );

    expect(result.errors).toEqual([
      'LIBRETRANSLATE_URL must be an http(s) URL when TRANSLATION_PROVIDER=libretranslate',
    ]);
  });
});
