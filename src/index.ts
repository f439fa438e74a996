/**
 * Lingo Batch - server entry point
 */

import 'dotenv/config';
import { loadConfig, validateConfig } from './config.js';
import { createApp, VERSION } from './server.js';
import { createProvider, createItemTranslator } from './services/engine-integration.js';
import { TranslationService } from './services/translation-service.js';
import { SessionHistoryStore } from './services/history.js';

async function startServer(): Promise<void> {
  const config = loadConfig();
  const validation = validateConfig(config);

  if (!validation.valid) {
    for (const error of validation.errors) {
      console.error(`[Config] ❌ ${error}`);
    }
    throw new Error('Invalid configuration, see .env.example');
  }

  const provider = createProvider(config);
  if (!(await provider.isAvailable())) {
    console.warn(`[Server] ⚠️ ${provider.name} did not answer the availability check, translations may fail`);
  }

  const translator = createItemTranslator(config, provider);
  const service = new TranslationService(translator, {
    batchConcurrency: config.batch.concurrency,
  });
  const history = new SessionHistoryStore({ ttlMs: config.session.ttlMs });

  const app = createApp({ config, service, history });

  app.listen(config.port, () => {
    console.log(`
╔═══════════════════════════════════════════════════════════╗
║                                                           ║
║   🌍 Lingo Batch v${VERSION}                                   ║
║   English → French · Spanish · German                     ║
║                                                           ║
╠═══════════════════════════════════════════════════════════╣
║                                                           ║
║   🌐 Server: http://localhost:${config.port}
║   🤖 Provider: ${translator.providerName}
║   🗂️  Cache window: ${Math.round(config.translation.cacheTtlMs / 1000)}s
║                                                           ║
╚═══════════════════════════════════════════════════════════╝
`);
  });
}

startServer().catch(error => {
  console.error('[Server] ❌ Failed to start:', error);
  process.exit(1);
});
