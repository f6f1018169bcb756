/**
 * url-brief web server
 * Express app serving the prompt form and its JSON API
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import './types.js'; // Augments Express.Request with requestId
import cors from 'cors';
import { randomUUID } from 'crypto';
import { existsSync } from 'fs';
import type { Server } from 'http';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig, type AppConfig } from '../config.js';
import { OllamaChatBackend, type ChatBackend } from '../core/chat.js';
import { createSources } from '../core/pipeline.js';
import type { SourceRegistry } from '../core/sources.js';
import { createHealthRouter } from './routes/health.js';
import { createPromptRouter } from './routes/prompt.js';
import { createModelsRouter } from './routes/models.js';
import { createChatRouter } from './routes/chat.js';

// Static form assets live in src/server/public (also found from dist/src/server/)
const __dirname_app = dirname(fileURLToPath(import.meta.url));

function resolvePublicDir(): string | null {
  const candidates = [
    join(__dirname_app, 'public'),
    join(__dirname_app, '..', '..', '..', 'src', 'server', 'public'),
  ];
  return candidates.find(candidate => existsSync(join(candidate, 'index.html'))) ?? null;
}

export interface AppDependencies {
  sources?: SourceRegistry;
  chatBackend?: ChatBackend;
}

export function createApp(config: AppConfig = loadConfig(), deps: AppDependencies = {}): Express {
  const app = express();

  const sources = deps.sources ?? createSources({
    requestTimeoutMs: config.requestTimeoutMs,
    maxCommentDepth: config.maxCommentDepth,
  });
  const chatBackend = deps.chatBackend ?? new OllamaChatBackend({
    host: config.ollamaHost,
    chatTimeoutMs: config.chatTimeoutMs,
    modelsTimeoutMs: config.modelsTimeoutMs,
  });

  // ─── Request ID ─────────────────────────────────────────────────────────────
  // Must run before all other middleware so req.requestId is always set.
  app.use((req: Request, res: Response, next: NextFunction) => {
    req.requestId = randomUUID();
    res.setHeader('X-Request-Id', req.requestId);
    next();
  });

  // Hard server-side timeouts, sized to the outbound calls each route makes
  app.use((req: Request, res: Response, next: NextFunction) => {
    let timeoutMs = 30000;
    if (req.path === '/api/chat') timeoutMs = config.chatTimeoutMs + 5000;
    else if (req.path === '/api/prompt') timeoutMs = config.requestTimeoutMs * 2 + 5000;
    else if (req.path === '/api/models') timeoutMs = config.modelsTimeoutMs + 5000;

    req.setTimeout(timeoutMs);
    res.setTimeout(timeoutMs, () => {
      if (!res.headersSent) {
        res.status(504).json({
          success: false,
          error: {
            type: 'timeout',
            message: `Request timed out after ${timeoutMs / 1000}s`,
          },
          requestId: req.requestId,
        });
      }
    });
    next();
  });

  // Prompts are capped at 100k characters; leave room for user edits
  app.use(express.json({ limit: '2mb' }));

  if (config.corsOrigins.length > 0) {
    app.use(cors({ origin: config.corsOrigins }));
  }

  // SECURITY: Security headers
  app.disable('x-powered-by');
  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'no-referrer');
    res.setHeader('Content-Security-Policy', "default-src 'self'; frame-ancestors 'none'; base-uri 'none'; form-action 'self'");
    next();
  });

  // SECURITY: JSON parse error handler
  app.use((err: Error, req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof SyntaxError && 'body' in err) {
      res.status(400).json({
        success: false,
        error: {
          type: 'invalid_request',
          message: 'Malformed JSON in request body',
        },
        requestId: req.requestId,
      });
      return;
    }
    next(err);
  });

  app.use(createHealthRouter());
  app.use(createPromptRouter(sources));
  app.use(createModelsRouter(chatBackend));
  app.use(createChatRouter(chatBackend));

  const publicDir = resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir));
  } else {
    console.warn('[url-brief] form assets not found; serving the API only');
  }

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        type: 'not_found',
        message: `Route not found: ${req.method} ${req.path}`,
      },
      requestId: req.requestId,
    });
  });

  // Error handler - stack traces only outside production
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error('[url-brief] Unhandled error:', err);
    if (res.headersSent) return;

    res.status(500).json({
      success: false,
      error: {
        type: 'internal_error',
        message: err.message || 'An unexpected error occurred',
      },
      requestId: req.requestId,
      ...(config.production ? {} : { stack: err.stack }),
    });
  });

  return app;
}

export function startServer(config: AppConfig = loadConfig(), deps: AppDependencies = {}): Server {
  const app = createApp(config, deps);

  const server = app.listen(config.port, config.host, () => {
    console.log(`[url-brief] listening on http://${config.host}:${config.port}`);
    console.log(`[url-brief] health check: http://${config.host}:${config.port}/health`);
    console.log(`[url-brief] chat backend: ${config.ollamaHost}`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('\n[url-brief] shutting down...');
    server.close(() => {
      console.log('[url-brief] server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      console.error('[url-brief] forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return server;
}

// Start server if run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer();
}
