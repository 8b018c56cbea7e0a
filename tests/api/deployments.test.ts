import express from 'express';
import { z } from 'zod';
import { createApp } from '../../src/server';
import { Environment } from '../../src/domain/environment';
import { Harness, createHarness, deferred, silenceLogs, waitFor } from '../helpers/fakes';
import { as, request } from './request';

silenceLogs();

const ProposalSchema = z.object({ confirmation: z.object({ tokenId: z.string() }) });

describe('Deployment API', () => {
  let harness: Harness;
  let app: express.Application;

  beforeEach(() => {
    harness = createHarness();
    app = createApp(harness.ctx);
  });

  async function propose(path: string, body?: unknown): Promise<string> {
    const res = await request(app, 'POST', path, body, as('alice'));
    expect(res.status).toBe(202);
    return ProposalSchema.parse(res.body).confirmation.tokenId;
  }

  it('GET /health needs no identity', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0', storage: 'memory' });
  });

  it('requests without an identity are rejected', async () => {
    const res = await request(app, 'POST', '/deployments', { environment: 'staging' });
    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({ error: { code: 'AUTH.UNAUTHENTICATED', message: 'Missing x-identity-id header' } });
  });

  describe('POST /deployments', () => {
    it('runs a staging deploy', async () => {
      const res = await request(app, 'POST', '/deployments', { environment: 'staging', commit: 'abc1' }, as('sam'));

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        outcome: {
          environment: 'staging',
          status: 'success',
          commit: 'abc1',
          imageReference: 'registry.test/app:staging-abc1',
        },
      });
    });

    it('proposes a production deploy', async () => {
      const res = await request(app, 'POST', '/deployments', { environment: 'production', commit: 'def2' }, as('alice'));

      expect(res.status).toBe(202);
      expect(res.body).toMatchObject({
        confirmation: {
          action: 'deploy',
          environment: 'production',
          commit: 'def2',
          status: 'proposed',
          expiresAt: '2024-06-01T12:05:00.000Z',
        },
        message: 'Deploy commit def2 to production? Confirm to proceed.',
      });
      expect(harness.steps.calls).toEqual([]);
    });

    it('an unknown environment is a validation error', async () => {
      const res = await request(app, 'POST', '/deployments', { environment: 'qa' }, as('alice'));
      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ error: { code: 'VALIDATION.ENVIRONMENT' } });
    });

    it('a malformed body is a validation error', async () => {
      const res = await request(app, 'POST', '/deployments', { environment: 5 }, as('alice'));
      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({
        error: { code: 'VALIDATION.SCHEMA', message: 'Invalid request body', details: { issues: [{ path: 'environment' }] } },
      });
    });

    it('a staging operator may not touch production', async () => {
      const res = await request(app, 'POST', '/deployments', { environment: 'production' }, as('sam'));
      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({
        error: { code: 'AUTH.FORBIDDEN', message: 'Role "staging-operator" may not deploy production' },
      });
    });

    it('a deploy while another runs on the environment is a conflict', async () => {
      const gate = deferred();
      harness.steps.buildGate = gate.promise;
      const running = harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });

      const res = await request(app, 'POST', '/deployments', { environment: 'staging', commit: 'aaa2' }, as('alice'));
      gate.resolve();
      await running;

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: { code: 'DEPLOY.IN_PROGRESS', retryable: true } });
    });
  });

  describe('confirmations', () => {
    it('confirming runs the deploy exactly once', async () => {
      const tokenId = await propose('/deployments', { environment: 'production', commit: 'def2' });

      const first = await request(app, 'POST', `/confirmations/${tokenId}/confirm`, undefined, as('alice'));
      expect(first.status).toBe(200);
      expect(first.body).toMatchObject({ outcome: { status: 'success', environment: 'production' } });

      const replay = await request(app, 'POST', `/confirmations/${tokenId}/confirm`, undefined, as('alice'));
      expect(replay.status).toBe(409);
      expect(replay.body).toMatchObject({ error: { code: 'AUTH.TOKEN_CONSUMED' } });
      expect(harness.steps.deployed).toEqual(['registry.test/app:production-def2']);
    });

    it('an expired token is gone', async () => {
      const tokenId = await propose('/deployments', { environment: 'production' });
      harness.clock.now += 300_000;

      const res = await request(app, 'POST', `/confirmations/${tokenId}/confirm`, undefined, as('alice'));
      expect(res.status).toBe(410);
      expect(res.body).toMatchObject({ error: { code: 'AUTH.TOKEN_EXPIRED' } });
    });

    it('an unknown token is not found', async () => {
      const res = await request(app, 'POST', '/confirmations/cfm_nope/confirm', undefined, as('alice'));
      expect(res.status).toBe(404);
    });

    it('only the proposer can confirm', async () => {
      const tokenId = await propose('/deployments', { environment: 'production' });
      const res = await request(app, 'POST', `/confirmations/${tokenId}/confirm`, undefined, as('sam'));
      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({ error: { code: 'AUTH.CONTEXT_MISMATCH' } });
    });

    it('a proposal can be cancelled', async () => {
      const tokenId = await propose('/environments/production/rollback');

      const res = await request(app, 'POST', `/confirmations/${tokenId}/cancel`, undefined, as('alice'));
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ confirmation: { tokenId, action: 'rollback', status: 'cancelled' } });
    });

    it('a confirmed rollback restores the previous image', async () => {
      await harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      await harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });
      const tokenId = await propose('/environments/staging/rollback');

      const res = await request(app, 'POST', `/confirmations/${tokenId}/confirm`, undefined, as('alice'));
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ rollback: { success: true, image: 'registry.test/app:staging-aaa1' } });
    });
  });

  describe('POST /environments/:environment/cancel', () => {
    it('cancels the running deploy', async () => {
      const gate = deferred();
      harness.steps.buildGate = gate.promise;
      const running = harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      await waitFor(() => harness.steps.calls.includes('build'));

      const res = await request(app, 'POST', '/environments/staging/cancel', undefined, as('sam'));
      gate.resolve();
      const outcome = await running;

      expect(res.status).toBe(202);
      expect(res.body).toEqual({
        attemptId: outcome.attemptId,
        message: `Cancellation of ${outcome.attemptId} requested; it stops before its next step.`,
      });
      expect(outcome.status).toBe('failed');
      expect(outcome.error?.code).toBe('STEP.CANCELED');
    });

    it('is not found when nothing is running', async () => {
      const res = await request(app, 'POST', '/environments/production/cancel', undefined, as('alice'));
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { code: 'DEPLOY.NOT_RUNNING' } });
    });

    it('a staging operator may not cancel production', async () => {
      const res = await request(app, 'POST', '/environments/production/cancel', undefined, as('sam'));
      expect(res.status).toBe(403);
    });
  });

  it('GET /environments/:environment/status', async () => {
    await harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });

    const res = await request(app, 'GET', '/environments/staging/status', undefined, as('sam'));
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: {
        environment: 'staging',
        current: 'registry.test/app:staging-aaa1',
        previous: null,
        lastDeploy: { commit: 'aaa1' },
        health: { url: 'http://staging.test/health', healthy: true, statusCode: 200 },
      },
    });
  });

  describe('GET /audit', () => {
    it('returns the most recent entries', async () => {
      await propose('/environments/staging/rollback');
      await propose('/environments/production/rollback');

      const res = await request(app, 'GET', '/audit?limit=1', undefined, as('alice'));
      expect(res.status).toBe(200);
      const body = z.object({ entries: z.array(z.object({ action: z.string(), environment: z.string() })) }).parse(res.body);
      expect(body.entries).toEqual([{ action: 'rollback_proposed', environment: 'production' }]);
    });

    it('rejects an out-of-range limit', async () => {
      const res = await request(app, 'GET', '/audit?limit=0', undefined, as('alice'));
      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ error: { code: 'VALIDATION.SCHEMA' } });
    });

    it('requires a role', async () => {
      const res = await request(app, 'GET', '/audit', undefined, as('mallory'));
      expect(res.status).toBe(403);
    });
  });
});
