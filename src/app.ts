import express, { Application } from 'express';
import morgan from 'morgan';
import { LoadResult } from './loader.js';
import { createApiRoutes } from './routes/api.js';

export interface AppOptions {
  /** Log each request with morgan (default: true) */
  logRequests?: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(data: LoadResult, options: AppOptions = {}): Application {
  const app = express();

  app.use(express.json({ limit: '5mb' }));
  if (options.logRequests ?? true) {
    app.use(morgan('dev'));
  }

  app.use('/api', createApiRoutes(data));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      documents: data.documents.size,
      errors: data.errors.length
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
