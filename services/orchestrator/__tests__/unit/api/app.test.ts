/**
 * HTTP API Tests
 *
 * Runs the express app against the in-process pipeline through supertest.
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import request from 'supertest';

import { rawOpportunity, userProfile } from '@pipeline/test-utils';
import { createApp } from '../../../src/api';
import type { PipelineApiContext } from '../../../src/api';
import { createHarness } from '../../helpers/pipeline-harness';
import type { Harness } from '../../helpers/pipeline-harness';

describe('pipeline API', () => {
  let harness: Harness;

  function setup(overrides: Partial<PipelineApiContext> = {}) {
    harness = createHarness({ config: { automationLevel: 'review' } });
    const app = createApp({
      orchestrator: harness.orchestrator,
      tracker: harness.tracker,
      weights: harness.weights,
      submissions: harness.submissions,
      logger: harness.logger,
      ...overrides,
    });
    return { app, ...harness };
  }

  async function discoverPending(app: ReturnType<typeof setup>['app']): Promise<string> {
    const res = await request(app)
      .post('/api/opportunities')
      .send({ raw: rawOpportunity().build(), profile: userProfile().build() })
      .expect(201);
    await harness.orchestrator.onIdle();
    return res.body.application.id;
  }

  afterEach(async () => {
    await harness.orchestrator.stop();
  });

  describe('GET /api/health', () => {
    it('should report healthy with component stats', async () => {
      const { app } = setup();

      const res = await request(app).get('/api/health').expect(200);

      expect(res.body.status).toBe('healthy');
      expect(res.body.weightsVersion).toBe(1);
      expect(res.body.workflow).toEqual(expect.objectContaining({ running: 0, queued: 0 }));
      expect(res.body.submissions).toBeDefined();
    });

    it('should report degraded when the readiness check fails', async () => {
      const { app } = setup({ healthCheck: async () => false });

      const res = await request(app).get('/api/health').expect(503);

      expect(res.body.status).toBe('degraded');
    });

    it('should report degraded when the readiness check throws', async () => {
      const { app, logger } = setup({
        healthCheck: () => Promise.reject(new Error('connection refused')),
      });

      await request(app).get('/api/health').expect(503);

      expect(logger.hasLogWithMeta('warn', { error: 'connection refused' })).toBe(true);
    });
  });

  describe('POST /api/opportunities', () => {
    it('should create a Discovered application', async () => {
      const { app, orchestrator } = setup();

      const res = await request(app)
        .post('/api/opportunities')
        .send({ raw: rawOpportunity().build(), profile: userProfile().build() })
        .expect(201);
      await orchestrator.onIdle();

      expect(res.body.application.state).toBe('Discovered');
      expect(res.body.application.userId).toBe('user-1');
      const stored = await request(app).get(`/api/applications/${res.body.application.id}`).expect(200);
      expect(stored.body.application.state).toBe('PendingApproval');
    });

    it('should reject a request without a profile', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/api/opportunities')
        .send({ raw: rawOpportunity().build() })
        .expect(400);

      expect(res.body.error).toBe('validation_failed');
      expect(res.body.message).toBe('Invalid discover request');
      expect(res.body.issues).toEqual(expect.arrayContaining([expect.objectContaining({ path: 'profile' })]));
    });

    it('should reject a listing with neither url nor description', async () => {
      const { app } = setup();
      const { url: _url, description: _description, ...raw } = rawOpportunity().build();

      const res = await request(app)
        .post('/api/opportunities')
        .send({ raw, profile: userProfile().build() })
        .expect(400);

      expect(res.body.issues).toEqual([{ path: 'raw.url', message: 'Either url or description is required' }]);
    });

    it('should reject malformed JSON', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/api/opportunities')
        .set('Content-Type', 'application/json')
        .send('{"raw":')
        .expect(400);

      expect(res.body).toEqual({ error: 'invalid_json', message: 'Request body is not valid JSON' });
    });
  });

  describe('application routes', () => {
    it('should filter the application list', async () => {
      const { app } = setup();
      const id = await discoverPending(app);

      const pending = await request(app).get('/api/applications?state=PendingApproval').expect(200);
      const others = await request(app).get('/api/applications?userId=user-2').expect(200);

      expect(pending.body.count).toBe(1);
      expect(pending.body.applications[0].id).toBe(id);
      expect(others.body).toEqual({ applications: [], count: 0 });
    });

    it('should reject an unknown state filter', async () => {
      const { app } = setup();

      const res = await request(app).get('/api/applications?state=Limbo').expect(400);

      expect(res.body.message).toBe('Unknown state: Limbo');
    });

    it('should answer 404 for an unknown application', async () => {
      const { app } = setup();

      const res = await request(app).get('/api/applications/app_missing').expect(404);

      expect(res.body.error).toBe('not_found');
    });

    it('should return the timeline of an application', async () => {
      const { app } = setup();
      const id = await discoverPending(app);

      const res = await request(app).get(`/api/applications/${id}/timeline`).expect(200);

      expect(res.body.applicationId).toBe(id);
      expect(res.body.state).toBe('PendingApproval');
      expect(Array.isArray(res.body.events)).toBe(true);
      expect(res.body.followUps).toEqual([]);
    });

    it('should apply an approval once and answer 409 after', async () => {
      const { app } = setup();
      const id = await discoverPending(app);
      const decision = { decision: 'Approved', reviewer: 'reviewer-1' };

      const first = await request(app).post(`/api/applications/${id}/approval`).send(decision).expect(200);
      const second = await request(app).post(`/api/applications/${id}/approval`).send(decision).expect(409);

      expect(first.body.accepted).toBe(true);
      expect(second.body.accepted).toBe(false);
    });

    it('should validate an approval body', async () => {
      const { app } = setup();
      const id = await discoverPending(app);

      await request(app).post(`/api/applications/${id}/approval`).send({ decision: 'Maybe' }).expect(400);
    });

    it('should answer 409 for an outcome outside Tracking', async () => {
      const { app } = setup();
      const id = await discoverPending(app);

      const res = await request(app)
        .post(`/api/applications/${id}/outcome`)
        .send({ outcome: 'Accepted', observedAt: 10 })
        .expect(409);

      expect(res.body.application.state).toBe('PendingApproval');
    });

    it('should cancel with the default reason and answer 409 after', async () => {
      const { app } = setup();
      const id = await discoverPending(app);

      const first = await request(app).post(`/api/applications/${id}/cancel`).send({}).expect(200);
      const second = await request(app).post(`/api/applications/${id}/cancel`).send({}).expect(409);

      expect(first.body.application.state).toBe('Abandoned');
      expect(first.body.application.reason).toBe('operator_cancelled');
      expect(second.body.cancelled).toBe(false);
    });
  });

  describe('users and weights', () => {
    it('should return the funnel for a user', async () => {
      const { app } = setup();
      await discoverPending(app);

      const res = await request(app).get('/api/users/user-1/funnel').expect(200);

      expect(res.body.userId).toBe('user-1');
      expect(res.body.discovered).toBe(1);
      expect(res.body.submitted).toBe(0);
    });

    it('should install operator weights as a new version', async () => {
      const { app } = setup();

      const res = await request(app)
        .post('/api/weights')
        .send({ weights: { skillMatch: 2, prestige: 1 } })
        .expect(201);
      const listing = await request(app).get('/api/weights').expect(200);

      expect(res.body.current.version).toBe(2);
      expect(res.body.current.source).toBe('operator');
      expect(listing.body.versions).toBe(2);
    });

    it('should refuse weights without a positive entry', async () => {
      const { app } = setup();

      const res = await request(app).post('/api/weights').send({ weights: { skillMatch: 0 } }).expect(400);

      expect(res.body.message).toBe('Invalid scoring weights');
    });
  });

  it('should answer 404 for an unknown route', async () => {
    const { app } = setup();

    const res = await request(app).get('/api/nothing-here').expect(404);

    expect(res.body).toEqual({ error: 'not_found', message: 'Route not found' });
  });
});
