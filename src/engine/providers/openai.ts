/**
 * OpenAI translation provider
 */

import OpenAI from 'openai';
import type {
  ITranslationProvider,
  ProviderConfig,
  TranslateOptions,
} from '../interfaces/translation-provider.js';
import { getLanguageLabel } from '../types/common.js';
import { TRANSLATOR_SYSTEM_PROMPT, createTranslatorPrompt } from '../prompts/system/translator.js';

interface ChatCompletionLike {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string | null;
  }>;
}

/**
 * The part of the OpenAI SDK client this provider uses
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: Array<{ role: 'system' | 'user'; content: string }>;
          temperature?: number;
        },
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletionLike>;
    };
  };
  models: {
    list(): Promise<unknown>;
  };
}

export class OpenAIProvider implements ITranslationProvider {
  readonly name = 'openai';
  readonly model: string;

  private client: ChatCompletionsClient;

  constructor(config: ProviderConfig, client?: ChatCompletionsClient) {
    this.model = config.model ?? 'gpt-4o-mini';

    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeout ?? 60000,
        maxRetries: 0,
      });
  }

  async translate(text: string, options: TranslateOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: TRANSLATOR_SYSTEM_PROMPT },
          {
            role: 'user',
            content: createTranslatorPrompt(text, getLanguageLabel(options.targetLanguage)),
          },
        ],
        temperature: 0,
      },
      { signal: options.signal }
    );

    const choice = response.choices[0];
    const content = choice?.message.content?.trim();

    if (!content) {
      throw new Error(`OpenAI returned an empty translation (finish reason: ${choice?.finish_reason ?? 'none'})`);
    }

    return content;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }
}
