import { Router } from 'express';
import type { Request, Response } from 'express';
import { asyncRoute } from '../types';
import type { PipelineApiContext } from '../types';

export function createWeightsRoutes(ctx: PipelineApiContext): Router {
  const router = Router();

  router.get('/weights', (_req: Request, res: Response) => {
    res.json({ current: ctx.weights.current(), versions: ctx.weights.history().length });
  });

  /**
   * POST /api/weights
   * Operator override; installs a new version.
   */
  router.post(
    '/weights',
    asyncRoute(async (req, res) => {
      const installed = ctx.weights.install(req.body, 'operator');
      res.status(201).json({ current: installed });
    })
  );

  return router;
}
