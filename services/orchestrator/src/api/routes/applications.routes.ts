import { Router } from 'express';
import { ApprovalDecisionSchema, CancelRequestSchema, OutcomeEventSchema } from '@pipeline/config';
import { NotFoundError } from '@pipeline/core';
import { ApplicationState } from '@pipeline/types';
import { parsePayload } from '../../validation';
import { asyncRoute } from '../types';
import type { PipelineApiContext } from '../types';

const STATES = new Set<string>(Object.values(ApplicationState));

function parseState(value: unknown): ApplicationState | undefined {
  if (typeof value !== 'string') return undefined;
  return Object.values(ApplicationState).find(state => state === value);
}

export function createApplicationRoutes(ctx: PipelineApiContext): Router {
  const router = Router();
  const { orchestrator, tracker } = ctx;

  async function requireApplication(id: string) {
    const application = await orchestrator.getApplication(id);
    if (!application) {
      throw new NotFoundError('ApplicationRecord', id);
    }
    return application;
  }

  /** GET /api/applications?userId=&state= */
  router.get(
    '/applications',
    asyncRoute(async (req, res) => {
      const { userId, state } = req.query;
      if (state !== undefined && (typeof state !== 'string' || !STATES.has(state))) {
        res.status(400).json({ error: 'validation_failed', message: `Unknown state: ${String(state)}` });
        return;
      }
      const applications = await orchestrator.listApplications({
        userId: typeof userId === 'string' ? userId : undefined,
        state: parseState(state),
      });
      res.json({ applications, count: applications.length });
    })
  );

  router.get(
    '/applications/:id',
    asyncRoute(async (req, res) => {
      res.json({ application: await requireApplication(req.params.id) });
    })
  );

  router.get(
    '/applications/:id/timeline',
    asyncRoute(async (req, res) => {
      const application = await requireApplication(req.params.id);
      res.json({
        applicationId: application.id,
        state: application.state,
        events: tracker.getTimeline(application.id),
        followUps: tracker.pendingFollowUps(application.id),
      });
    })
  );

  /**
   * POST /api/applications/:id/approval
   * 409 when the application is not awaiting approval.
   */
  router.post(
    '/applications/:id/approval',
    asyncRoute(async (req, res) => {
      const body = parsePayload(ApprovalDecisionSchema, req.body, 'approval decision');
      const accepted = await orchestrator.handleApprovalDecision({ applicationId: req.params.id, ...body });
      const application = await requireApplication(req.params.id);
      res.status(accepted ? 200 : 409).json({ accepted, application });
    })
  );

  /**
   * POST /api/applications/:id/outcome
   * 409 unless the application is in Tracking.
   */
  router.post(
    '/applications/:id/outcome',
    asyncRoute(async (req, res) => {
      const body = parsePayload(OutcomeEventSchema, req.body, 'outcome event');
      const accepted = await orchestrator.handleOutcome({
        applicationId: req.params.id,
        outcome: body.outcome,
        observedAt: body.observedAt ?? Date.now(),
      });
      const application = await requireApplication(req.params.id);
      res.status(accepted ? 200 : 409).json({ accepted, application });
    })
  );

  /**
   * POST /api/applications/:id/cancel
   * 409 when the application is already terminal.
   */
  router.post(
    '/applications/:id/cancel',
    asyncRoute(async (req, res) => {
      const body = parsePayload(CancelRequestSchema, req.body ?? {}, 'cancel request');
      const cancelled = await orchestrator.cancel(req.params.id, body.reason);
      const application = cancelled ?? (await requireApplication(req.params.id));
      res.status(cancelled ? 200 : 409).json({ cancelled: cancelled !== null, application });
    })
  );

  return router;
}
