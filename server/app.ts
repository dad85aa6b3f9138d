import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import multer from 'multer';
import type { AppSettings, ParseResult } from '../src/types';
import type { ReferenceParser } from '../src/services/parsing/parseOrchestrator';
import type { ReferenceVerifier } from '../src/services/verification/verificationOrchestrator';
import { resultsToCsv } from '../src/services/export/csvExport';
import type { Logger } from '../src/services/utils/logger';

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

export interface AppDeps {
  settings: AppSettings;
  parser: ReferenceParser;
  /** Enables `?verify=true` on POST /api/parse */
  verifier?: ReferenceVerifier | null;
  logger: Logger;
}

function rateLimit(windowMs: number, maxRequests: number): RequestHandler {
  const requestCounts = new Map<string, { count: number; resetTime: number }>();

  return (req, res, next) => {
    const clientIp = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const clientData = requestCounts.get(clientIp);

    if (!clientData || now > clientData.resetTime) {
      requestCounts.set(clientIp, { count: 1, resetTime: now + windowMs });
      next();
    } else if (clientData.count >= maxRequests) {
      res.status(429).json({ error: 'Too many requests. Please try again later.' });
    } else {
      clientData.count++;
      next();
    }
  };
}

const securityHeaders: RequestHandler = (_req, res, next) => {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('X-XSS-Protection', '1; mode=block');
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
  next();
};

function textFromBody(body: unknown): string | null {
  if (!body || typeof body !== 'object' || !('text' in body)) return null;
  return typeof body.text === 'string' ? body.text : null;
}

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) return null;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function summarize(results: ParseResult[]) {
  const succeeded = results.filter(r => r.ok).length;
  return { count: results.length, succeeded, failed: results.length - succeeded };
}

/**
 * Express app exposing the parser. Listening is left to the caller.
 */
export function createApp({ settings, parser, verifier = null, logger }: AppDeps): express.Express {
  const app = express();

  // Text uploads stay in memory
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 },
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(rateLimit(settings.server.rateLimitWindowMs, settings.server.rateLimitMaxRequests));
  app.use(securityHeaders);

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, tagger: parser.tagger.name, verification: verifier ? verifier.sources : [] });
  });

  app.post('/api/parse', upload.single('file'), async (req, res) => {
    try {
      let text: string | null;
      const file = req.file;
      if (file) {
        const mime = (file.mimetype || '').toLowerCase();
        if (!mime.startsWith('text/')) {
          res.status(400).json({ error: `Unsupported file type: ${file.mimetype}` });
          return;
        }
        text = file.buffer.toString('utf8');
      } else {
        text = textFromBody(req.body);
      }

      if (text === null) {
        res.status(400).json({ error: 'Missing text (JSON field "text" or upload field "file")' });
        return;
      }

      const wantsVerification = req.query.verify === 'true' || req.query.verify === '1';
      if (wantsVerification && !verifier) {
        res.status(400).json({ error: 'Verification is not enabled on this server' });
        return;
      }

      const started = Date.now();
      const results = await parser.parse(text);
      const elapsed = Date.now() - started;
      logger.info(`POST /api/parse: ${results.length} result(s) in ${elapsed}ms`);

      if (req.query.format === 'csv') {
        res.type('text/csv').send(resultsToCsv(results));
        return;
      }

      const verification =
        wantsVerification && verifier ? await verifier.verifyAll(results.flatMap(r => (r.ok ? [r.record] : []))) : undefined;

      res.json({
        results,
        ...summarize(results),
        ...(verification ? { verification } : {}),
        tagger: parser.tagger.name,
        elapsed_ms: elapsed,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      logger.error('POST /api/parse failed:', message);
      res.status(500).json({ error: message });
    }
  });

  const handleErrors: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }
    // body-parser marks its own failures (e.g. 413 entity too large) with a 4xx status
    const status = clientErrorStatus(err) ?? 500;
    const message = err instanceof Error ? err.message : 'Unknown error';
    if (status === 500) logger.error('Unhandled request error:', message);
    res.status(status).json({ error: message });
  };
  app.use(handleErrors);

  return app;
}
