import { Router } from 'express';
import { DiscoverRequestSchema } from '@pipeline/config';
import { parsePayload } from '../../validation';
import { asyncRoute } from '../types';
import type { PipelineApiContext } from '../types';

export function createOpportunityRoutes(ctx: PipelineApiContext): Router {
  const router = Router();

  /**
   * POST /api/opportunities
   * Body: { raw, profile }. Returns the (possibly pre-existing) application.
   */
  router.post(
    '/opportunities',
    asyncRoute(async (req, res) => {
      const body = parsePayload(DiscoverRequestSchema, req.body, 'discover request');
      const application = await ctx.orchestrator.discover(body.raw, body.profile);
      res.status(201).json({ application });
    })
  );

  return router;
}
