/**
 * Lingo Batch - web server for the translator UI
 *
 * Routes:
 * - single text translation with per-session history
 * - .txt / .csv batch translation returned as a CSV report
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import type { AppConfig } from './config.js';
import { validateConfig, hasProvider } from './config.js';
import {
  LANGUAGE_CHOICES,
  UnsupportedFormatError,
  isSupportedFormat,
  translationFileName,
} from './engine/index.js';
import { TranslationService, parseTargetLanguage } from './services/translation-service.js';
import { SessionHistoryStore } from './services/history.js';
import { sessionMiddleware, SESSION_HEADER } from './middleware/session.js';
import { requireSessionId, parseBooleanField } from './utils/requestHelpers.js';
import { toHttpError } from './utils/httpErrors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const VERSION = '0.1.0';

export interface AppDependencies {
  config: AppConfig;
  service: TranslationService;
  history: SessionHistoryStore;
  clientDir?: string;
}

export function createApp({ config, service, history, clientDir }: AppDependencies): express.Express {
  const app = express();
  const configValidation = validateConfig(config);

  // Uploaded batch files stay in memory
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.batch.maxFileSizeBytes },
    fileFilter: (_req, file, cb) => {
      if (isSupportedFormat(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedFormatError(file.originalname.toLowerCase().split('.').pop() || ''));
      }
    },
  });

  // Middleware
  app.use(
    cors({
      exposedHeaders: [SESSION_HEADER, 'Content-Disposition', 'X-Parsed-Count', 'X-Failed-Count'],
    })
  );
  app.use(express.json({ limit: '1mb' }));
  app.use('/api', sessionMiddleware);

  // ============ API Routes ============

  // System status
  app.get('/api/status', (_req, res) => {
    res.json({
      version: VERSION,
      ready: configValidation.valid,
      translation: {
        ...service.getStatus(),
        configured: hasProvider(config),
      },
      config: {
        valid: configValidation.valid,
        errors: configValidation.errors,
      },
    });
  });

  app.get('/api/languages', (_req, res) => {
    res.json(LANGUAGE_CHOICES);
  });

  // ============ Single translation ============

  app.post('/api/translate', async (req, res) => {
    try {
      const target = parseTargetLanguage(req.body?.target);
      const text: unknown = req.body?.text;

      const translation = await service.translateText({
        sourceText: typeof text === 'string' ? text : '',
        targetLanguage: target,
      });
      const entry = history.forSession(requireSessionId(req)).append(translation);

      console.log(`[Translate] ✅ ${entry.targetLabel}: ${entry.sourceText.length} chars`);
      res.json({ entry });
    } catch (error) {
      const { status, body } = toHttpError(error);
      if (status >= 500) {
        console.error('[Translate] ❌ Translation failed:', body.error);
        body.error = `Translation failed: ${body.error}`;
      }
      res.status(status).json(body);
    }
  });

  // ============ Batch translation ============

  app.post('/api/batch', upload.single('file'), async (req, res) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: 'No file uploaded (expected a .txt or .csv file in "file")' });
      }

      const target = parseTargetLanguage(req.body?.target);
      const result = await service.translateFile({
        buffer: req.file.buffer,
        filename: req.file.originalname,
        target,
        hasHeader: parseBooleanField(req.body?.hasHeader),
      });

      if (result.status === 'empty') {
        return res.json({
          status: 'empty',
          parsedCount: result.parsedCount,
          message: 'No usable lines found in the uploaded file.',
        });
      }

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('X-Parsed-Count', String(result.parsedCount));
      res.setHeader('X-Failed-Count', String(result.failedCount));
      res.attachment(result.filename);
      return res.send(result.csv);
    } catch (error) {
      const { status, body } = toHttpError(error);
      if (body.code === 'INPUT_PARSE') {
        body.error = `Failed to parse file: ${body.error}`;
      }
      console.error('[Batch] ❌', body.error);
      return res.status(status).json(body);
    }
  });

  // ============ History ============

  app.get('/api/history', (req, res) => {
    const entries = history.forSession(requireSessionId(req)).newestFirst();
    res.json(entries);
  });

  app.delete('/api/history', (req, res) => {
    history.forSession(requireSessionId(req)).clear();
    res.json({ success: true });
  });

  app.get('/api/history/:id/download', (req, res) => {
    const entry = history.forSession(requireSessionId(req)).get(req.params.id);
    if (!entry) {
      return res.status(404).json({ error: 'History entry not found' });
    }

    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.attachment(translationFileName(entry.targetLanguage, new Date(entry.createdAt)));
    return res.send(entry.translatedText);
  });

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ============ Client ============

  const staticDir = clientDir ?? path.join(__dirname, '../dist/client');
  const indexPath = path.join(staticDir, 'index.html');
  if (fs.existsSync(indexPath)) {
    app.use(express.static(staticDir));
    app.get('*', (_req, res) => {
      res.sendFile(indexPath);
    });
  }

  // ============ Errors ============

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ error: error.message, code: error.code });
    }

    const { status, body } = toHttpError(error);
    if (status >= 500) {
      console.error('[Server] ❌ Unhandled error:', error);
    }
    return res.status(status).json(body);
  });

  return app;
}
