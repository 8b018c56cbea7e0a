import { AuditEntry } from '../../src/domain/audit';
import { DeploymentStatus, StepStatus } from '../../src/domain/deployment';
import { Environment } from '../../src/domain/environment';
import { DeploymentError, stateCorruptionError } from '../../src/domain/errors';
import { ImageState } from '../../src/domain/image-state';
import { MemoryAuditStore, MemoryImageStateStore } from '../../src/storage/memory-store';
import { auditActions, createHarness, deferred, imageFor, silenceLogs, waitFor } from '../helpers/fakes';

silenceLogs();

/** Lifecycle entries only, without per-step noise. */
async function lifecycle(harness: ReturnType<typeof createHarness>): Promise<string[]> {
  return (await auditActions(harness.ctx)).filter((a) => !a.startsWith('step_'));
}

describe('DeploymentOrchestrator', () => {
  it('deploys staging and records the new image', async () => {
    const harness = createHarness();
    const { ctx, steps } = harness;

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'abc1' });

    expect(outcome.status).toBe(DeploymentStatus.Success);
    expect(outcome.attemptId).toMatch(/^dep_/);
    expect(outcome.imageReference).toBe('registry.test/app:staging-abc1');
    expect(outcome.message).toBe('Deployment to staging succeeded: registry.test/app:staging-abc1 (commit abc1).');
    expect(outcome.warnings).toEqual([]);
    expect(outcome.steps.map((s) => s.step)).toEqual([
      DeploymentStatus.Validating,
      DeploymentStatus.Building,
      DeploymentStatus.Pushing,
      DeploymentStatus.RecordingState,
      DeploymentStatus.DeployingTarget,
      DeploymentStatus.HealthChecking,
    ]);
    expect(steps.calls).toEqual(['checkout', 'build', 'push', 'deployTarget']);
    expect(harness.health.probes).toHaveLength(1);

    expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
      current: 'registry.test/app:staging-abc1',
      previous: null,
    });
    expect(await lifecycle(harness)).toEqual(['deploy_started', 'deploy_success']);
    expect((await ctx.store.imageState.lastSuccess(Environment.Staging))?.commit).toBe('abc1');
  });

  it('uses the branch head when no commit is given', async () => {
    const { ctx, steps } = createHarness();
    steps.headCommit = 'beef42';

    const outcome = await ctx.orchestrator.deploy({ requester: 'sam', environment: Environment.Staging });
    expect(outcome.commit).toBe('beef42');
    expect(outcome.imageReference).toBe(imageFor(Environment.Staging, 'beef42'));
  });

  it('rolls production back when the new image never turns healthy', async () => {
    const harness = createHarness();
    const { ctx, steps, health } = harness;
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Production, commit: 'abc1' });
    health.unhealthyImages.add(imageFor(Environment.Production, 'def2'));

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Production, commit: 'def2' });

    expect(outcome.status).toBe(DeploymentStatus.RolledBack);
    expect(outcome.error?.code).toBe('HEALTH.EXHAUSTED');
    expect(outcome.restoredImage).toBe('registry.test/app:production-abc1');
    expect(outcome.requiresManualIntervention).toBe(false);
    expect(outcome.message).toBe(
      'Deployment to production failed at health-checking: Health check failed after 10 attempts. ' +
        'Rolled back to registry.test/app:production-abc1.',
    );
    expect(await ctx.store.imageState.read(Environment.Production)).toMatchObject({
      current: 'registry.test/app:production-abc1',
      previous: 'registry.test/app:production-def2',
    });
    expect(steps.deployed).toEqual([
      'registry.test/app:production-abc1',
      'registry.test/app:production-def2',
      'registry.test/app:production-abc1',
    ]);
    // 1 + 10 + 1 probes; sleeps only between the failing attempts
    expect(health.probes).toHaveLength(12);
    expect(health.sleeps).toEqual(Array(9).fill(10_000));
    expect(await lifecycle(harness)).toEqual([
      'deploy_started',
      'deploy_success',
      'deploy_started',
      'deploy_failed',
      'rollback_started',
      'rollback_success',
    ]);
  });

  it('a failure before the rotation leaves the image state unchanged', async () => {
    const harness = createHarness();
    const { ctx, steps } = harness;
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
    steps.failAt = 'build';

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });

    expect(outcome.status).toBe(DeploymentStatus.Failed);
    expect(outcome.error).toMatchObject({ code: 'STEP.FAILED', step: DeploymentStatus.Building });
    expect(outcome.message).toBe('Deployment to staging failed at building: build exited with code 1. Image state unchanged.');
    expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
      current: 'registry.test/app:staging-aaa1',
      previous: null,
    });
    expect(await lifecycle(harness)).toEqual(['deploy_started', 'deploy_success', 'deploy_started', 'deploy_failed']);
  });

  it('a failed target deploy after the rotation redeploys the previous image', async () => {
    const { ctx, steps } = createHarness();
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
    steps.failDeployOf.add(imageFor(Environment.Staging, 'aaa2'));

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });

    expect(outcome.status).toBe(DeploymentStatus.RolledBack);
    expect(outcome.error?.message).toBe('rollout of registry.test/app:staging-aaa2 failed');
    expect(steps.running.get(Environment.Staging)).toBe('registry.test/app:staging-aaa1');
  });

  it('a rollback whose restored image is unhealthy needs manual intervention', async () => {
    const harness = createHarness();
    const { ctx, health } = harness;
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
    health.unhealthyImages.add(imageFor(Environment.Staging, 'aaa1'));
    health.unhealthyImages.add(imageFor(Environment.Staging, 'aaa2'));

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });

    expect(outcome.status).toBe(DeploymentStatus.RollbackFailed);
    expect(outcome.requiresManualIntervention).toBe(true);
    expect(outcome.rollbackError?.code).toBe('ROLLBACK.FAILED');
    expect(outcome.message).toBe(
      'Deployment to staging failed at health-checking: Health check failed after 10 attempts. ' +
        'Rollback FAILED: Restored image registry.test/app:staging-aaa1 failed its health check. Manual intervention required.',
    );
    // no second rollback
    expect(await lifecycle(harness)).toEqual([
      'deploy_started',
      'deploy_success',
      'deploy_started',
      'deploy_failed',
      'rollback_started',
      'rollback_failed',
    ]);
    expect(health.probes).toHaveLength(21);
  });

  it('a first deploy that fails after the rotation has nothing to roll back to', async () => {
    const { ctx, health } = createHarness();
    health.unhealthyImages.add(imageFor(Environment.Staging, 'aaa1'));

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });

    expect(outcome.status).toBe(DeploymentStatus.RollbackFailed);
    expect(outcome.rollbackError?.code).toBe('ROLLBACK.NO_PREVIOUS_IMAGE');
    expect(outcome.requiresManualIntervention).toBe(true);
  });

  it('the gate is checked again when the pipeline starts', async () => {
    const { ctx, steps } = createHarness();

    const outcome = await ctx.orchestrator.deploy({ requester: 'sam', environment: Environment.Production, commit: 'abc1' });

    expect(outcome.status).toBe(DeploymentStatus.Failed);
    expect(outcome.error).toMatchObject({ code: 'AUTH.FORBIDDEN', message: 'Role "staging-operator" may not deploy production' });
    expect(steps.calls).toEqual([]);
  });

  it('a malformed commit never reaches checkout', async () => {
    const { ctx, steps } = createHarness();

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'main' });

    expect(outcome.error?.code).toBe('VALIDATION.COMMIT');
    expect(steps.calls).toEqual([]);
  });

  it('a step that outlives its timeout is aborted and fails the attempt', async () => {
    const { ctx, steps } = createHarness({ timeouts: { checkoutMs: 1_000, buildMs: 20, pushMs: 1_000, deployTargetMs: 1_000 } });
    steps.buildGate = new Promise<void>(() => undefined);

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'abc1' });

    expect(outcome.status).toBe(DeploymentStatus.Failed);
    expect(outcome.message).toBe('Deployment to staging failed at building: Step "building" timed out after 20ms. Image state unchanged.');
    expect(steps.signals[1].aborted).toBe(true);
  });

  describe('concurrency', () => {
    it('a second attempt on the same environment is rejected, not queued', async () => {
      const harness = createHarness();
      const { ctx, steps } = harness;
      const gate = deferred();
      steps.buildGate = gate.promise;

      const first = ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      const running = ctx.orchestrator.activeAttempt(Environment.Staging);
      expect(running?.id).toMatch(/^dep_/);

      await expect(
        ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' }),
      ).rejects.toMatchObject({ code: 'DEPLOY.IN_PROGRESS' });
      await expect(
        ctx.orchestrator.rollback({ requester: 'alice', environment: Environment.Staging }),
      ).rejects.toMatchObject({ code: 'DEPLOY.IN_PROGRESS' });

      gate.resolve();
      expect((await first).status).toBe(DeploymentStatus.Success);
      expect(ctx.orchestrator.activeAttempt(Environment.Staging)).toBeUndefined();

      const entries: AuditEntry[] = await ctx.store.audit.list({ limit: 100 });
      const denied = entries.filter((e) => e.outcome === 'denied');
      expect(denied.map((e) => e.action)).toEqual(['deploy_failed', 'rollback_failed']);
      expect(denied[0].details).toEqual({ code: 'DEPLOY.IN_PROGRESS', runningAttemptId: running?.id });
      expect(steps.deployed).toEqual(['registry.test/app:staging-aaa1']);
    });

    it('different environments deploy concurrently', async () => {
      const { ctx, steps } = createHarness();
      const gate = deferred();
      steps.buildGate = gate.promise;

      const staging = ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      const production = ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Production, commit: 'bbb1' });
      expect(ctx.orchestrator.activeAttempt(Environment.Production)).toBeDefined();

      gate.resolve();
      const outcomes = await Promise.all([staging, production]);
      expect(outcomes.map((o) => o.status)).toEqual([DeploymentStatus.Success, DeploymentStatus.Success]);
    });
  });

  it('cancellation stops the attempt at the next step boundary', async () => {
    const harness = createHarness();
    const { ctx, steps } = harness;
    const gate = deferred();
    steps.buildGate = gate.promise;

    const pending = ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'abc1' });
    await waitFor(() => steps.calls.includes('build'));
    const attemptId = ctx.orchestrator.cancel(Environment.Staging, 'ada');
    expect(attemptId).toMatch(/^dep_/);
    gate.resolve();
    const outcome = await pending;

    expect(outcome.status).toBe(DeploymentStatus.Failed);
    expect(outcome.error?.code).toBe('STEP.CANCELED');
    expect(outcome.message).toBe(
      'Deployment to staging failed at pushing: Deployment canceled by ada before "pushing". Image state unchanged.',
    );
    expect(outcome.steps[outcome.steps.length - 1].status).toBe(StepStatus.Canceled);
    expect(steps.calls).toEqual(['checkout', 'build']);
    expect(await lifecycle(harness)).toEqual(['deploy_started', 'deploy_canceled']);
    expect(ctx.orchestrator.cancel(Environment.Staging, 'ada')).toBeUndefined();
  });

  it('cancellation after the image state rotated still rolls back', async () => {
    const harness = createHarness();
    const { ctx, steps } = harness;
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
    const gate = deferred();
    steps.deployGate = gate.promise;

    const pending = ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });
    await waitFor(() => steps.deployed.length === 2);
    expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
      current: 'registry.test/app:staging-aaa2',
      previous: 'registry.test/app:staging-aaa1',
    });
    ctx.orchestrator.cancel(Environment.Staging, 'ada');
    gate.resolve();
    const outcome = await pending;

    expect(outcome.status).toBe(DeploymentStatus.RolledBack);
    expect(outcome.error?.code).toBe('STEP.CANCELED');
    expect(outcome.restoredImage).toBe('registry.test/app:staging-aaa1');
    expect(outcome.message).toBe(
      'Deployment to staging failed at health-checking: Deployment canceled by ada before "health-checking". ' +
        'Rolled back to registry.test/app:staging-aaa1.',
    );
    expect(steps.deployed).toEqual([
      'registry.test/app:staging-aaa1',
      'registry.test/app:staging-aaa2',
      'registry.test/app:staging-aaa1',
    ]);
    expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
      current: 'registry.test/app:staging-aaa1',
      previous: 'registry.test/app:staging-aaa2',
    });
    expect(await lifecycle(harness)).toEqual([
      'deploy_started',
      'deploy_success',
      'deploy_started',
      'deploy_canceled',
      'rollback_started',
      'rollback_success',
    ]);
  });

  it('a running manual rollback cannot be canceled', async () => {
    const { ctx, steps } = createHarness();
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
    await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });
    const gate = deferred();
    steps.deployGate = gate.promise;

    const pending = ctx.orchestrator.rollback({ requester: 'alice', environment: Environment.Staging });
    await waitFor(() => steps.deployed.length === 3);
    expect(ctx.orchestrator.cancel(Environment.Staging, 'ada')).toBeUndefined();
    gate.resolve();

    expect((await pending).success).toBe(true);
  });

  it('corrupt image state halts the attempt without a rollback', async () => {
    class CorruptImageStateStore extends MemoryImageStateStore {
      async read(environment: Environment): Promise<ImageState> {
        throw new DeploymentError(stateCorruptionError(environment, 'current slot is empty'));
      }
    }
    const harness = createHarness({ store: { imageState: new CorruptImageStateStore(), audit: new MemoryAuditStore() } });

    const outcome = await harness.ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'abc1' });

    expect(outcome.status).toBe(DeploymentStatus.Failed);
    expect(outcome.requiresManualIntervention).toBe(true);
    expect(outcome.message).toBe(
      'Deployment to staging stopped: Image state for staging is corrupt: current slot is empty. ' +
        'Automated actions on staging are halted until the image state is repaired.',
    );
    expect(await lifecycle(harness)).toEqual(['deploy_started', 'deploy_failed', 'state_corrupted']);
  });

  it('audit write failures are reported as warnings', async () => {
    class FailingAuditStore extends MemoryAuditStore {
      async append(): Promise<AuditEntry> {
        throw new Error('disk full');
      }
    }
    const { ctx } = createHarness({ store: { imageState: new MemoryImageStateStore(), audit: new FailingAuditStore() } });

    const outcome = await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'abc1' });

    expect(outcome.status).toBe(DeploymentStatus.Success);
    expect(outcome.warnings).toHaveLength(14);
    expect(outcome.warnings[0]).toBe('audit entry "deploy_started" was not written: disk full');
  });

  describe('manual rollback', () => {
    it('restores the previous image and redeploys it', async () => {
      const harness = createHarness();
      const { ctx, steps } = harness;
      await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });

      const outcome = await ctx.orchestrator.rollback({ requester: 'alice', environment: Environment.Staging });

      expect(outcome.success).toBe(true);
      expect(outcome.attemptId).toMatch(/^rbk_/);
      expect(outcome.message).toBe('Rollback of staging complete. Current image: registry.test/app:staging-aaa1.');
      expect(steps.running.get(Environment.Staging)).toBe('registry.test/app:staging-aaa1');
      expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
        current: 'registry.test/app:staging-aaa1',
        previous: 'registry.test/app:staging-aaa2',
      });
    });

    it('refuses when there is no previous image and changes nothing', async () => {
      const harness = createHarness();
      const { ctx, steps } = harness;
      await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });

      const outcome = await ctx.orchestrator.rollback({ requester: 'alice', environment: Environment.Staging });

      expect(outcome.success).toBe(false);
      expect(outcome.error?.code).toBe('ROLLBACK.NO_PREVIOUS_IMAGE');
      expect(outcome.message).toBe('Rollback of staging refused: No previous image found for staging. Cannot rollback.');
      expect(outcome.requiresManualIntervention).toBe(false);
      expect(await ctx.store.imageState.read(Environment.Staging)).toMatchObject({
        current: 'registry.test/app:staging-aaa1',
        previous: null,
      });
      expect(steps.deployed).toEqual(['registry.test/app:staging-aaa1']);
      expect(await lifecycle(harness)).toEqual(['deploy_started', 'deploy_success', 'rollback_started', 'rollback_denied']);
    });

    it('a staging operator may not roll back', async () => {
      const harness = createHarness();
      const outcome = await harness.ctx.orchestrator.rollback({ requester: 'sam', environment: Environment.Staging });

      expect(outcome.success).toBe(false);
      expect(outcome.error?.code).toBe('AUTH.FORBIDDEN');
      expect(outcome.message).toBe('Rollback of staging denied: Role "staging-operator" may not rollback staging.');
      expect(await auditActions(harness.ctx)).toEqual(['authorization_denied']);
    });

    it('a redeploy failure leaves the rollback failed', async () => {
      const { ctx, steps } = createHarness();
      await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa1' });
      await ctx.orchestrator.deploy({ requester: 'alice', environment: Environment.Staging, commit: 'aaa2' });
      steps.failDeployOf.add(imageFor(Environment.Staging, 'aaa1'));

      const outcome = await ctx.orchestrator.rollback({ requester: 'alice', environment: Environment.Staging });

      expect(outcome.success).toBe(false);
      expect(outcome.requiresManualIntervention).toBe(true);
      expect(outcome.error?.message).toBe(
        'Redeploying registry.test/app:staging-aaa1 failed: rollout of registry.test/app:staging-aaa1 failed',
      );
      expect(outcome.message).toBe(
        'Rollback of staging FAILED: Redeploying registry.test/app:staging-aaa1 failed: ' +
          'rollout of registry.test/app:staging-aaa1 failed. Manual intervention required.',
      );
    });
  });
});
