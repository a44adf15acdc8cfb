import { Router } from 'express';
import { getErrorMessage } from '@pipeline/core';
import { asyncRoute } from '../types';
import type { PipelineApiContext } from '../types';

export function createHealthRoutes(ctx: PipelineApiContext): Router {
  const router = Router();

  /**
   * GET /api/health
   * 503 when the extra readiness check fails.
   */
  router.get(
    '/health',
    asyncRoute(async (_req, res) => {
      let dependenciesHealthy = true;
      if (ctx.healthCheck) {
        try {
          dependenciesHealthy = await ctx.healthCheck();
        } catch (error) {
          ctx.logger.warn('Health check failed', { error: getErrorMessage(error) });
          dependenciesHealthy = false;
        }
      }

      res.status(dependenciesHealthy ? 200 : 503).json({
        status: dependenciesHealthy ? 'healthy' : 'degraded',
        workflow: ctx.orchestrator.getPoolStats(),
        submissions: ctx.submissions.getStats(),
        weightsVersion: ctx.weights.current().version,
        timestamp: Date.now(),
      });
    })
  );

  return router;
}
