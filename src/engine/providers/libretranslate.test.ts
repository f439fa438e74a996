import { describe, it, expect, vi } from 'vitest';
import { LibreTranslateProvider } from './libretranslate.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createFetch(response: () => Response) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => response());
}

describe('LibreTranslateProvider', () => {
  it('posts the text and returns translatedText', async () => {
    const fetchImpl = createFetch(() => jsonResponse({ translatedText: 'Bonjour' }));
    const provider = new LibreTranslateProvider({ baseUrl: 'http://lt.local/' }, fetchImpl);

    const result = await provider.translate('Hello', { sourceLanguage: 'en', targetLanguage: 'fr' });

    expect(result).toBe('Bonjour');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://lt.local/translate');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      q: 'Hello',
      source: 'en',
      target: 'fr',
      format: 'text',
    });
  });

  it('sends the API key when one is configured', async () => {
    const fetchImpl = createFetch(() => jsonResponse({ translatedText: 'Hallo' }));
    const provider = new LibreTranslateProvider({ baseUrl: 'http://lt.local', apiKey: 'test-key' }, fetchImpl);

    await provider.translate('Hello', { sourceLanguage: 'en', targetLanguage: 'de' });

    const [, init] = fetchImpl.mock.calls[0];
    expect(JSON.parse(String(init?.body)).api_key).toBe('test-key');
  });

  it('throws the server error for non-2xx answers', async () => {
    const fetchImpl = createFetch(() => jsonResponse({ error: 'es is not supported' }, 400));
    const provider = new LibreTranslateProvider({ baseUrl: 'http://lt.local' }, fetchImpl);

    await expect(
      provider.translate('Hello', { sourceLanguage: 'en', targetLanguage: 'es' })
    ).rejects.toThrow('LibreTranslate HTTP 400: es is not supported');
  });

  it('throws when the body has no translatedText', async () => {
    const fetchImpl = createFetch(() => jsonResponse({ result: 'Hola' }));
    const provider = new LibreTranslateProvider({ baseUrl: 'http://lt.local' }, fetchImpl);

    await expect(
      provider.translate('Hello', { sourceLanguage: 'en', targetLanguage: 'es' })
    ).rejects.toThrow('LibreTranslate response has no translatedText');
  });

  it('requires a base URL', () => {
    expect(() => new LibreTranslateProvider({})).toThrow('LibreTranslate base URL is required');
  });

  it('reports availability from the languages endpoint', async () => {
    const provider = new LibreTranslateProvider(
      { baseUrl: 'http://lt.local' },
      createFetch(() => jsonResponse([], 503))
    );

    expect(await provider.isAvailable()).toBe(false);
  });
});
