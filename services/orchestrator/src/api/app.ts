import express from 'express';
import type { Express } from 'express';
import { configureErrorHandling, configureMiddleware } from './middleware';
import { setupAllRoutes } from './routes';
import type { PipelineApiContext } from './types';

export function createApp(ctx: PipelineApiContext): Express {
  const app = express();
  app.disable('x-powered-by');
  configureMiddleware(app, ctx.logger, ctx.rateLimit);
  setupAllRoutes(app, ctx);
  configureErrorHandling(app, ctx.logger);
  return app;
}
