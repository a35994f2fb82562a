import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express } from 'express';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler } from '../api/middleware/error-handler.js';
import { env } from '../config/env.js';

export interface ExpressAppOptions {
  /** Reports the store connection state on GET /health */
  databaseState?: () => string;
}

/**
 * Build the Express app with the shared middleware stack.
 *
 * Routes are mounted afterwards by the modules' run() phase, then
 * mountErrorHandling() closes the chain. Body parsing is left to the
 * routers that take a body.
 */
export function createExpressApp(options: ExpressAppOptions = {}): Express {
  const app = express();

  app.use(requestContext);
  // The browser client is served from another origin and downloads attachments cross-origin.
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));

  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type']
  }));

  app.use(compression());

  if (env.NODE_ENV !== 'test') {
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev'));
  }

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      database: options.databaseState?.() ?? 'unknown',
      timestamp: Date.now()
    });
  });

  return app;
}

export function mountErrorHandling(app: Express): void {
  app.use(errorHandler);
}
