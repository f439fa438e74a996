/**
 * Configuration management for Lingo Batch
 */

export type ProviderName = 'openai' | 'libretranslate';

export interface AppConfig {
  // Server
  port: number;

  // Translation provider
  provider: ProviderName;
  openai: {
    apiKey: string;
    model: string;
    baseUrl?: string;
  };
  libretranslate: {
    url: string;
    apiKey: string;
  };

  // Translation settings
  translation: {
    timeoutMs: number;
    cacheTtlMs: number;
  };

  // Batch uploads
  batch: {
    concurrency: number;
    maxFileSizeBytes: number;
  };

  // In-memory session history
  session: {
    ttlMs: number;
  };
}

type Env = Record<string, string | undefined>;

function parseProvider(value: string | undefined): ProviderName {
  return value?.toLowerCase() === 'libretranslate' ? 'libretranslate' : 'openai';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseInt(env.PORT ?? '3000', 10),

    provider: parseProvider(env.TRANSLATION_PROVIDER),
    openai: {
      apiKey: env.OPENAI_API_KEY ?? '',
      model: env.OPENAI_MODEL ?? 'gpt-4o-mini',
      baseUrl: env.OPENAI_BASE_URL || undefined,
    },
    libretranslate: {
      url: env.LIBRETRANSLATE_URL ?? '',
      apiKey: env.LIBRETRANSLATE_API_KEY ?? '',
    },

    translation: {
      timeoutMs: parseInt(env.TRANSLATION_TIMEOUT_MS ?? '15000', 10),
      cacheTtlMs: parseInt(env.CACHE_TTL_SECONDS ?? '3600', 10) * 1000,
    },

    batch: {
      concurrency: parseInt(env.BATCH_CONCURRENCY ?? '1', 10),
      maxFileSizeBytes: Math.floor(parseFloat(env.MAX_UPLOAD_MB ?? '5') * 1024 * 1024),
    },

    session: {
      ttlMs: parseInt(env.SESSION_TTL_MINUTES ?? '120', 10) * 60 * 1000,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.provider === 'openai' && !config.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required when TRANSLATION_PROVIDER=openai');
  }

  if (config.provider === 'libretranslate' && !/^https?:\/\//.test(config.libretranslate.url)) {
    errors.push('LIBRETRANSLATE_URL must be an http(s) URL when TRANSLATION_PROVIDER=libretranslate');
  }

  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    errors.push('PORT must be between 1 and 65535');
  }

  if (!(config.translation.timeoutMs > 0)) {
    errors.push('TRANSLATION_TIMEOUT_MS must be a positive number');
  }

  if (!(config.translation.cacheTtlMs > 0)) {
    errors.push('CACHE_TTL_SECONDS must be a positive number');
  }

  if (!Number.isInteger(config.batch.concurrency) || config.batch.concurrency < 1) {
    errors.push('BATCH_CONCURRENCY must be at least 1');
  }

  if (!(config.batch.maxFileSizeBytes >= 1)) {
    errors.push('MAX_UPLOAD_MB must allow at least one byte');
  }

  if (!(config.session.ttlMs > 0)) {
    errors.push('SESSION_TTL_MINUTES must be a positive number');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if the selected provider has what it needs
 */
export function hasProvider(config: AppConfig): boolean {
  return config.provider === 'openai'
    ? Boolean(config.openai.apiKey)
    : Boolean(config.libretranslate.url);
}
