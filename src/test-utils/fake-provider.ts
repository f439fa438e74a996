import { vi } from 'vitest';
import type {
  ITranslationProvider,
  TranslateOptions,
} from '../engine/interfaces/translation-provider.js';
import type { TargetLanguage } from '../engine/types/common.js';

export type FakeTranslate = (
  text: string,
  target: TargetLanguage,
  signal?: AbortSignal
) => string | Promise<string>;

/**
 * In-process provider: "<target>:<text>" unless given another implementation
 */
export class FakeProvider implements ITranslationProvider {
  readonly name = 'fake';
  readonly calls: Array<{ text: string; target: TargetLanguage }> = [];

  constructor(private impl: FakeTranslate = (text, target) => `${target}:${text}`) {}

  async translate(text: string, options: TranslateOptions): Promise<string> {
    this.calls.push({ text, target: options.targetLanguage });
    return this.impl(text, options.targetLanguage, options.signal);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Provider that throws for the listed inputs
 */
export function failingFor(texts: string[], message = 'provider unavailable'): FakeProvider {
  return new FakeProvider((text, target) => {
    if (texts.includes(text)) {
      throw new Error(message);
    }
    return `${target}:${text}`;
  });
}

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
}
