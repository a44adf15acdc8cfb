import type { Express } from 'express';
import type { PipelineApiContext } from '../types';
import { createApplicationRoutes } from './applications.routes';
import { createHealthRoutes } from './health.routes';
import { createOpportunityRoutes } from './opportunities.routes';
import { createUserRoutes } from './users.routes';
import { createWeightsRoutes } from './weights.routes';

export function setupAllRoutes(app: Express, ctx: PipelineApiContext): void {
  app.use('/api', createHealthRoutes(ctx));
  app.use('/api', createOpportunityRoutes(ctx));
  app.use('/api', createApplicationRoutes(ctx));
  app.use('/api', createUserRoutes(ctx));
  app.use('/api', createWeightsRoutes(ctx));
}

export {
  createApplicationRoutes,
  createHealthRoutes,
  createOpportunityRoutes,
  createUserRoutes,
  createWeightsRoutes,
};
