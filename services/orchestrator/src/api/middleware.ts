import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { NotFoundError, ValidationError, getErrorMessage } from '@pipeline/core';
import type { ILogger } from '@pipeline/core';

const DEFAULT_RATE_LIMIT = { windowMs: 15 * 60 * 1000, limit: 300 };

export function configureMiddleware(
  app: Express,
  logger: ILogger,
  limits: { windowMs: number; limit: number } = DEFAULT_RATE_LIMIT
): void {
  app.use(helmet());
  app.use(express.json({ limit: '1mb', strict: true }));

  app.use(
    rateLimit({
      windowMs: limits.windowMs,
      limit: limits.limit,
      message: { error: 'Too many requests' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('API Request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - start,
      });
    });
    next();
  });
}

function isJsonParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Map the error taxonomy onto HTTP: 400 for validation, 404 for unknown ids,
 * 500 for anything else.
 */
export function configureErrorHandling(app: Express, logger: ILogger): void {
  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not_found', message: 'Route not found' });
  });

  // Express recognizes error middleware by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ValidationError) {
      res.status(400).json({ error: 'validation_failed', message: error.message, issues: error.issues });
      return;
    }
    if (isJsonParseError(error)) {
      res.status(400).json({ error: 'invalid_json', message: 'Request body is not valid JSON' });
      return;
    }
    if (error instanceof NotFoundError) {
      res.status(404).json({ error: 'not_found', message: error.message });
      return;
    }

    logger.error('Unhandled API error', { method: req.method, url: req.originalUrl, error: getErrorMessage(error) });
    res.status(500).json({ error: 'internal_error', message: 'Internal server error' });
  });
}
