/**
 * What the route handlers read and drive. The service passes its live
 * components; tests pass the same components wired in-process.
 */

import type { Request, Response, RequestHandler } from 'express';
import type { ILogger } from '@pipeline/core';
import type { WeightsRegistry } from '../scoring';
import type { SubmissionEngine } from '../submission';
import type { StatusTracker } from '../tracking';
import type { WorkflowOrchestrator } from '../workflow';

export interface PipelineApiContext {
  orchestrator: WorkflowOrchestrator;
  tracker: StatusTracker;
  weights: WeightsRegistry;
  submissions: SubmissionEngine;
  logger: ILogger;
  /** Extra readiness check, e.g. a Redis ping */
  healthCheck?: () => Promise<boolean>;
  rateLimit?: { windowMs: number; limit: number };
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

/** Forward async handler failures to the error middleware. */
export function asyncRoute(handler: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}
