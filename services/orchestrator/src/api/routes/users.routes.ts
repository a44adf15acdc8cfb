import { Router } from 'express';
import type { Request, Response } from 'express';
import type { PipelineApiContext } from '../types';

export function createUserRoutes(ctx: PipelineApiContext): Router {
  const router = Router();

  /** GET /api/users/:userId/funnel */
  router.get('/users/:userId/funnel', (req: Request, res: Response) => {
    res.json(ctx.tracker.getFunnel(req.params.userId));
  });

  return router;
}
