/**
 * REST API Server
 *
 * HTTP interface with:
 * - File upload and URL analysis endpoints
 * - Request ids, request logging, CORS
 * - Rate limiting on /api
 * - Built UI served with SPA fallback
 */

import express from 'express';
import { dirname, extname, join, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { fileURLToPath } from 'url';
import type { Server } from 'http';
import cors from 'cors';
import multer from 'multer';
import rateLimit from 'express-rate-limit';
import { nanoid } from 'nanoid';
import { ValidationError } from '../core/errors.js';
import { ALLOWED_EXTENSIONS, ALLOWED_URL_HOSTS, MAX_DURATION_SECONDS, MAX_UPLOAD_BYTES, isAllowedExtension } from '../core/limits.js';
import { removeFile } from '../core/storage/scratch.js';
import { UPLOAD_TIPS, URL_TIPS } from '../orchestrator/index.js';
import { analyzeUrlSchema, parseBody } from './validation.js';
import type { Orchestrator } from '../orchestrator/index.js';
import type { ErrorKind, Logger, PipelineOutcome } from '../core/types.js';

const requestIds = new WeakMap<express.Request, string>();

export function resolveRequestId(incoming: string | undefined): string {
  const trimmed = incoming?.trim();
  if (trimmed && trimmed.length > 0 && trimmed.length <= 128) {
    return trimmed;
  }
  return `req_${nanoid(10)}`;
}

function getRequestId(req: express.Request): string {
  return requestIds.get(req) ?? 'unknown';
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  forbidden: 403,
  duration_exceeded: 422,
  acquisition: 502,
  analysis: 502,
  unexpected: 500,
};

export function statusForOutcome(outcome: PipelineOutcome): number {
  return outcome.status === 'done' ? 200 : STATUS_BY_KIND[outcome.errorKind];
}

/** Remediation tips for a failure raised outside the orchestrator, chosen by route. */
export function tipsForPath(path: string): string[] {
  return [...(path.startsWith('/api/analyze/url') ? URL_TIPS : UPLOAD_TIPS)];
}

export function uploadFileName(originalName: string): string {
  const ext = extname(originalName).toLowerCase();
  return `${nanoid(12)}${isAllowedExtension(ext.slice(1)) ? ext : ''}`;
}

export interface CreateServerOptions {
  dataDir: string;
  logger: Logger;
  version?: string;
  /** Directory holding the built UI; searched for when omitted. */
  uiDir?: string | null;
}

function findUiDir(): string | null {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    join(here, '..', '..', 'ui-static'),       // dist/src/api → dist/ui-static
    join(process.cwd(), 'dist', 'ui-static'),
  ];
  return candidates.find(p => existsSync(join(p, 'index.html'))) ?? null;
}

export function createApp(orchestrator: Orchestrator, options: CreateServerOptions): express.Express {
  const { logger } = options;
  const dataDir = resolve(options.dataDir);
  const app = express();

  // ─── Rate Limiters ───────────────────────────────────────────
  // Built per app so each instance keeps its own counters.

  const generalLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later.' },
  });

  const analyzeLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 10,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many analysis requests, please try again later.' },
  });

  app.use((req, res, next) => {
    const requestId = resolveRequestId(req.header('x-request-id'));
    requestIds.set(req, requestId);
    res.setHeader('x-request-id', requestId);
    next();
  });

  // ─── CORS ─────────────────────────────────────────────────
  app.use(cors({
    origin: [/localhost/, /127\.0\.0\.1/],
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
  }));

  app.use(express.json({ limit: '100kb' }));

  app.use('/api', (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      const payload = {
        event: 'api_request',
        requestId: getRequestId(req),
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.error('API request', payload);
      } else if (res.statusCode >= 400) {
        logger.warn('API request', payload);
      } else {
        logger.info('API request', payload);
      }
    });
    next();
  });

  app.use('/api/', generalLimiter);

  // Uploads land in the data dir and are removed once the pipeline ends.
  const uploadDir = join(dataDir, 'uploads');
  mkdirSync(uploadDir, { recursive: true });
  const upload = multer({
    storage: multer.diskStorage({
      destination: uploadDir,
      filename: (_req, file, cb) => cb(null, uploadFileName(file.originalname)),
    }),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
    fileFilter: (_req, file, cb) => {
      const ext = extname(file.originalname).slice(1).toLowerCase();
      if (isAllowedExtension(ext)) {
        cb(null, true);
      } else {
        cb(new ValidationError(`Unsupported file type${ext ? ` .${ext}` : ''}. Allowed: ${ALLOWED_EXTENSIONS.join(', ')}`));
      }
    },
  });

  const sendOutcome = (res: express.Response, outcome: PipelineOutcome) => {
    res.status(statusForOutcome(outcome)).json(outcome);
  };

  // ─── Health & Limits ────────────────────────────────────

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: options.version ?? '0.0.0',
      name: 'Accent Detector',
      mimeDetector: orchestrator.mimeDetectorName,
    });
  });

  app.get('/api/limits', (_req, res) => {
    res.json({
      maxUploadBytes: MAX_UPLOAD_BYTES,
      maxDurationSeconds: MAX_DURATION_SECONDS,
      allowedExtensions: ALLOWED_EXTENSIONS,
      allowedHosts: ALLOWED_URL_HOSTS,
    });
  });

  app.get('/api/accents', (_req, res) => {
    res.json(orchestrator.listAccents());
  });

  // ─── Analysis ───────────────────────────────────────────

  app.post('/api/analyze/upload', analyzeLimiter, upload.single('file'), async (req, res, next) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({
        status: 'failed',
        requestId: getRequestId(req),
        errorKind: 'validation',
        error: 'No file uploaded',
        tips: [...UPLOAD_TIPS],
      });
      return;
    }
    try {
      const outcome = await orchestrator.analyzeUpload({
        path: file.path,
        originalName: file.originalname,
        size: file.size,
        mimeType: file.mimetype,
      }, getRequestId(req));
      sendOutcome(res, outcome);
    } catch (err) {
      next(err);
    } finally {
      // The uploads dir is shared between requests; only this file goes.
      removeFile(file.path, logger);
    }
  });

  app.post('/api/analyze/url', analyzeLimiter, async (req, res, next) => {
    try {
      const body = parseBody(analyzeUrlSchema, req.body);
      const outcome = await orchestrator.analyzeUrl(body.url, getRequestId(req));
      sendOutcome(res, outcome);
    } catch (err) {
      next(err);
    }
  });

  // ─── Serve UI ────────────────────────────────────────

  const uiPath = options.uiDir === undefined ? findUiDir() : options.uiDir;
  if (uiPath) {
    app.use(express.static(uiPath));
    app.get('*', (req, res, next) => {
      if (req.path.startsWith('/api') || req.path.startsWith('/health')) {
        next();
        return;
      }
      res.sendFile(join(uiPath, 'index.html'));
    });
  }

  // ─── Errors ─────────────────────────────────────────────

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = getRequestId(req);
    const tips = tipsForPath(req.path);
    if (err instanceof multer.MulterError) {
      const error = err.code === 'LIMIT_FILE_SIZE'
        ? `File is too large; the maximum upload size is ${MAX_UPLOAD_BYTES / (1024 * 1024)} MB`
        : err.message;
      res.status(400).json({ status: 'failed', requestId, errorKind: 'validation', error, tips });
      return;
    }
    if (err instanceof ValidationError) {
      res.status(400).json({ status: 'failed', requestId, errorKind: 'validation', error: err.message, tips });
      return;
    }
    logger.error('Unhandled API error', {
      requestId,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    res.status(500).json({ status: 'failed', requestId, errorKind: 'unexpected', error: 'Internal server error', tips });
  });

  return app;
}

export function createServer(
  orchestrator: Orchestrator,
  port: number,
  options: CreateServerOptions,
): { app: express.Express; server: Server } {
  const app = createApp(orchestrator, options);
  const server = app.listen(port, '0.0.0.0', () => {
    options.logger.info('Accent Detector API started', { port, url: `http://0.0.0.0:${port}` });
  });
  return { app, server };
}
