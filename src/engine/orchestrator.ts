/**
 * Deployment orchestrator: the pipeline state machine.
 *
 * Drives one attempt through
 *
 *   validating -> building -> pushing -> recording-state
 *     -> deploying-target -> health-checking -> success
 *
 * A failure before the image state is rotated ends the attempt at
 * `failed`. Once the rotation has committed, any failure (or a
 * cancellation) moves on to `rolling-back` and ends at `rolled-back` or
 * `rollback-failed`. Every step start and outcome is appended to the
 * audit trail before the machine advances, and the trail is flushed
 * before the outcome is returned.
 *
 * At most one attempt, deploy or manual rollback, runs per environment;
 * a second one is rejected with DEPLOY.IN_PROGRESS rather than queued.
 */

import { v4 as uuid } from 'uuid';
import { AuditService, AuditTrail } from '../audit/audit-service';
import { AuthorizationGate } from '../auth/authorization-gate';
import {
  DeploymentAttempt,
  DeploymentOutcome,
  DeploymentStatus,
  StepOutcome,
  StepStatus,
} from '../domain/deployment';
import { Environment, ImageReference, assertValidCommit, assertValidImage } from '../domain/environment';
import {
  DeploymentError,
  TypedError,
  authError,
  createTypedError,
  deploymentInProgressError,
  healthExhaustedError,
  stepCanceledError,
} from '../domain/errors';
import { ImageState } from '../domain/image-state';
import { Action } from '../domain/rbac';
import { ImageStateStore } from '../storage/store';
import { Logger, createLogger } from '../logger';
import { HealthChecker, HealthCheckPolicy } from './health-checker';
import { PipelineSteps, StepTimeouts } from './pipeline';
import { RollbackController } from './rollback-controller';
import { StepRunResult, runStep } from './step-runner';
import { transitionDeploymentStatus } from './state-machine';

export interface OrchestratorDeps {
  store: ImageStateStore;
  audit: AuditService;
  gate: AuthorizationGate;
  steps: PipelineSteps;
  healthChecker: HealthChecker;
  healthPolicy: HealthCheckPolicy;
  timeouts: StepTimeouts;
  rollback: RollbackController;
  logger?: Logger;
}

export interface DeployRequest {
  requester: string;
  environment: Environment;
  /** Commit to deploy; the branch head when omitted. */
  commit?: string;
  /** Confirmation token that authorized this request, if any. */
  confirmationId?: string;
}

export interface RollbackRequest {
  requester: string;
  environment: Environment;
  confirmationId?: string;
}

/** Terminal summary of a manual rollback. */
export interface RollbackOutcome {
  attemptId: string;
  environment: Environment;
  success: boolean;
  image?: ImageReference;
  error?: TypedError;
  steps: StepOutcome[];
  warnings: string[];
  message: string;
  requiresManualIntervention: boolean;
}

interface AttemptContext {
  attempt: DeploymentAttempt;
  trail: AuditTrail;
  log: Logger;
  /** True once recording-state has replaced current with the new image. */
  rotated: boolean;
  /** Image state read during validation. */
  before?: ImageState;
}

const CANCELLABLE_STATUSES: ReadonlySet<DeploymentStatus> = new Set([
  DeploymentStatus.Validating,
  DeploymentStatus.Building,
  DeploymentStatus.Pushing,
  DeploymentStatus.RecordingState,
  DeploymentStatus.DeployingTarget,
  DeploymentStatus.HealthChecking,
]);

export class DeploymentOrchestrator {
  private inFlight = new Map<Environment, DeploymentAttempt>();
  private cancelRequests = new Map<string, string>();
  private log: Logger;

  constructor(private deps: OrchestratorDeps) {
    this.log = deps.logger ?? createLogger({ component: 'orchestrator' });
  }

  /** The attempt currently holding an environment, if any. */
  activeAttempt(environment: Environment): DeploymentAttempt | undefined {
    const attempt = this.inFlight.get(environment);
    return attempt ? { ...attempt, steps: [...attempt.steps] } : undefined;
  }

  /**
   * Ask the running deploy on an environment to stop at its next step
   * boundary. The signal of a step already running is not aborted.
   * Returns the attempt id, or undefined when no deploy is in a
   * cancellable step (rollbacks always run to completion).
   */
  cancel(environment: Environment, canceledBy: string): string | undefined {
    const attempt = this.inFlight.get(environment);
    if (!attempt || !CANCELLABLE_STATUSES.has(attempt.status)) return undefined;
    this.cancelRequests.set(attempt.id, canceledBy);
    this.log.info('cancellation requested', { environment, attemptId: attempt.id, canceledBy });
    return attempt.id;
  }

  /** Run one deployment attempt to a terminal state. */
  async deploy(request: DeployRequest): Promise<DeploymentOutcome> {
    const attempt = await this.reserve(request.environment, request.requester, 'dep', request.confirmationId, request.commit);
    try {
      return await this.runDeploy(attempt, request);
    } finally {
      this.release(attempt);
    }
  }

  /** Manual rollback, sharing the per-environment guard with deploys. */
  async rollback(request: RollbackRequest): Promise<RollbackOutcome> {
    const attempt = await this.reserve(request.environment, request.requester, 'rbk', request.confirmationId);
    try {
      return await this.runRollback(attempt, request);
    } finally {
      this.release(attempt);
    }
  }

  // ─── Deploy ──────────────────────────────────────────────────────────────

  private async runDeploy(attempt: DeploymentAttempt, request: DeployRequest): Promise<DeploymentOutcome> {
    const { environment, requester } = request;
    const ctx: AttemptContext = {
      attempt,
      trail: new AuditTrail(this.deps.audit, { actorId: requester, correlationId: attempt.id, environment }),
      log: this.log.child({ attemptId: attempt.id, environment }),
      rotated: false,
    };
    const { steps, timeouts } = this.deps;

    ctx.trail.append('deploy_started', 'success', {
      commit: request.commit,
      confirmationId: request.confirmationId,
    });
    ctx.log.info('deployment started', { requester, commit: request.commit });

    const validated = await this.advance(ctx, DeploymentStatus.Validating, timeouts.checkoutMs, async (signal) => {
      const decision = this.deps.gate.check(requester, Action.Deploy, environment);
      if (!decision.permitted) {
        throw new DeploymentError(authError(decision.reason, { environment, action: Action.Deploy }));
      }
      if (request.commit !== undefined) assertValidCommit(request.commit);
      ctx.before = await this.deps.store.read(environment);
      const resolved = await steps.checkout({ environment, commit: request.commit }, signal);
      return assertValidCommit(resolved.commit);
    }, (commit) => ({ commit }));
    if (!validated.ok) return this.fail(ctx, validated.error);
    const commit = validated.value;
    attempt.commit = commit;

    const built = await this.advance(ctx, DeploymentStatus.Building, timeouts.buildMs, (signal) =>
      steps.build({ environment, commit, timestamp: new Date().toISOString() }, signal),
    (value) => ({ artifactTag: value.artifactTag }));
    if (!built.ok) return this.fail(ctx, built.error);

    const pushed = await this.advance(ctx, DeploymentStatus.Pushing, timeouts.pushMs, async (signal) => {
      const result = await steps.push({ environment, artifactTag: built.value.artifactTag }, signal);
      return assertValidImage(result.imageReference);
    }, (image) => ({ imageReference: image }));
    if (!pushed.ok) return this.fail(ctx, pushed.error);
    const image = pushed.value;
    attempt.imageReference = image;

    const recorded = await this.advance(ctx, DeploymentStatus.RecordingState, undefined, async () => {
      const state = await this.deps.store.recordDeploy(environment, image);
      ctx.rotated = true;
      return state;
    }, (state) => ({ current: state.current, previous: state.previous }));
    if (!recorded.ok) {
      ctx.rotated = await this.rotationCommitted(ctx, image);
      return this.fail(ctx, recorded.error);
    }

    const deployed = await this.advance(ctx, DeploymentStatus.DeployingTarget, timeouts.deployTargetMs, (signal) =>
      steps.deployTarget({ environment, imageReference: image }, signal),
    );
    if (!deployed.ok) return this.fail(ctx, deployed.error);

    const healthy = await this.advance(ctx, DeploymentStatus.HealthChecking, undefined, async () => {
      const result = await this.deps.healthChecker.poll(environment, this.deps.healthPolicy);
      if (result.status === 'unhealthy') {
        throw new DeploymentError(healthExhaustedError(result.url, result.attempts, result.lastStatusCode));
      }
      return result.attempts;
    }, (attempts) => ({ attempts }));
    if (!healthy.ok) return this.fail(ctx, healthy.error);

    this.transition(attempt, DeploymentStatus.Success);
    const deployedAt = new Date().toISOString();
    try {
      await this.deps.store.recordSuccess(environment, { commit, deployedAt });
    } catch (err) {
      ctx.log.warn('could not record deploy time', { error: err instanceof Error ? err.message : String(err) });
    }
    ctx.trail.append('deploy_success', 'success', { commit, image, healthAttempts: healthy.value });
    ctx.log.info('deployment succeeded', { commit, image });

    return this.finish(ctx, {
      message: `Deployment to ${environment} succeeded: ${image} (commit ${commit}).`,
      requiresManualIntervention: false,
    });
  }

  /**
   * Run one step: honor a pending cancellation, move the state machine,
   * audit the start, run the step, audit the outcome.
   */
  private async advance<T>(
    ctx: AttemptContext,
    step: DeploymentStatus,
    timeoutMs: number | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
    describe?: (value: T) => Record<string, unknown>,
  ): Promise<StepRunResult<T>> {
    const { attempt, trail } = ctx;
    const canceledBy = this.cancelRequests.get(attempt.id);
    if (canceledBy !== undefined) {
      attempt.canceledBy = canceledBy;
      const error = stepCanceledError(step, canceledBy);
      const now = new Date().toISOString();
      const outcome: StepOutcome = { step, status: StepStatus.Canceled, startedAt: now, completedAt: now, durationMs: 0, error };
      attempt.steps.push(outcome);
      return { ok: false, error, outcome };
    }

    if (attempt.status !== step) this.transition(attempt, step);
    trail.append('step_started', 'success', { step });

    const result = await runStep(step, timeoutMs, fn, describe);
    attempt.steps.push(result.outcome);
    if (result.ok) {
      trail.append('step_succeeded', 'success', { step, durationMs: result.outcome.durationMs, ...result.outcome.outputs });
    } else {
      trail.append('step_failed', 'failure', { step, code: result.error.code, reason: result.error.message });
      ctx.log.warn('step failed', { step, code: result.error.code, reason: result.error.message });
    }
    return result;
  }

  private async fail(ctx: AttemptContext, error: TypedError): Promise<DeploymentOutcome> {
    const { attempt, trail, log } = ctx;
    const environment = attempt.environment;
    const failedAt = error.step ?? attempt.status;
    this.transition(attempt, DeploymentStatus.Failed);

    const canceled = error.code === 'STEP.CANCELED';
    trail.append(canceled ? 'deploy_canceled' : 'deploy_failed', 'failure', {
      step: failedAt,
      code: error.code,
      reason: error.message,
      commit: attempt.commit,
      image: attempt.imageReference,
    });
    log.error('deployment failed', { step: failedAt, code: error.code, reason: error.message });

    if (error.code === 'STATE.CORRUPTION') {
      trail.append('state_corrupted', 'failure', { reason: error.message });
      return this.finish(ctx, {
        error,
        message: `Deployment to ${environment} stopped: ${error.message}. Automated actions on ${environment} are halted until the image state is repaired.`,
        requiresManualIntervention: true,
      });
    }

    if (!ctx.rotated) {
      return this.finish(ctx, {
        error,
        message: `Deployment to ${environment} failed at ${failedAt}: ${error.message}. Image state unchanged.`,
        requiresManualIntervention: false,
      });
    }

    this.transition(attempt, DeploymentStatus.RollingBack);
    log.warn('rolling back', { image: attempt.imageReference });
    const result = await this.deps.rollback.execute(environment, trail);
    attempt.steps.push(...result.steps);

    if (result.success) {
      this.transition(attempt, DeploymentStatus.RolledBack);
      return this.finish(ctx, {
        error,
        restoredImage: result.image,
        message: `Deployment to ${environment} failed at ${failedAt}: ${error.message}. Rolled back to ${result.image}.`,
        requiresManualIntervention: false,
      });
    }

    this.transition(attempt, DeploymentStatus.RollbackFailed);
    log.error('rollback failed', { code: result.error.code, reason: result.error.message });
    return this.finish(ctx, {
      error,
      rollbackError: result.error,
      restoredImage: result.image,
      message: `Deployment to ${environment} failed at ${failedAt}: ${error.message}. Rollback FAILED: ${result.error.message}. Manual intervention required.`,
      requiresManualIntervention: true,
    });
  }

  private async finish(
    ctx: AttemptContext,
    summary: Pick<DeploymentOutcome, 'message' | 'requiresManualIntervention' | 'error' | 'rollbackError' | 'restoredImage'>,
  ): Promise<DeploymentOutcome> {
    const { attempt } = ctx;
    attempt.completedAt = new Date().toISOString();
    const warnings = await ctx.trail.flush();
    return {
      attemptId: attempt.id,
      environment: attempt.environment,
      status: attempt.status,
      commit: attempt.commit,
      imageReference: attempt.imageReference,
      steps: attempt.steps,
      warnings,
      ...summary,
    };
  }

  /** After a failed rotation: did current actually move to the new image? */
  private async rotationCommitted(ctx: AttemptContext, image: ImageReference): Promise<boolean> {
    try {
      const after = await this.deps.store.read(ctx.attempt.environment);
      return after.current === image && after.previous === (ctx.before?.current ?? null);
    } catch {
      // Unreadable state is handled as corruption by the caller, without a rollback.
      return false;
    }
  }

  // ─── Manual rollback ─────────────────────────────────────────────────────

  private async runRollback(attempt: DeploymentAttempt, request: RollbackRequest): Promise<RollbackOutcome> {
    const { environment, requester } = request;
    const trail = new AuditTrail(this.deps.audit, { actorId: requester, correlationId: attempt.id, environment });
    const outcome = (fields: Omit<RollbackOutcome, 'attemptId' | 'environment' | 'warnings'>) =>
      trail.flush().then((warnings) => ({ attemptId: attempt.id, environment, warnings, ...fields }));

    const decision = this.deps.gate.check(requester, Action.Rollback, environment);
    if (!decision.permitted) {
      trail.append('authorization_denied', 'denied', { action: Action.Rollback, reason: decision.reason });
      return outcome({
        success: false,
        error: authError(decision.reason, { environment, action: Action.Rollback }),
        steps: [],
        message: `Rollback of ${environment} denied: ${decision.reason}.`,
        requiresManualIntervention: false,
      });
    }

    this.log.info('manual rollback started', { environment, requester, attemptId: attempt.id });
    const result = await this.deps.rollback.execute(environment, trail);
    if (result.success) {
      return outcome({
        success: true,
        image: result.image,
        steps: result.steps,
        message: `Rollback of ${environment} complete. Current image: ${result.image}.`,
        requiresManualIntervention: false,
      });
    }

    const noPrevious = result.error.code === 'ROLLBACK.NO_PREVIOUS_IMAGE';
    return outcome({
      success: false,
      image: result.image,
      error: result.error,
      steps: result.steps,
      message: noPrevious
        ? `Rollback of ${environment} refused: ${result.error.message}`
        : `Rollback of ${environment} FAILED: ${result.error.message}. Manual intervention required.`,
      requiresManualIntervention: !noPrevious,
    });
  }

  // ─── Guard ───────────────────────────────────────────────────────────────

  /**
   * Claim the environment. The check and the claim happen before the first
   * await, so two concurrent calls cannot both pass.
   */
  private async reserve(
    environment: Environment,
    requester: string,
    prefix: 'dep' | 'rbk',
    confirmationId?: string,
    commit?: string,
  ): Promise<DeploymentAttempt> {
    const running = this.inFlight.get(environment);
    if (running) {
      const error = deploymentInProgressError(environment, running.id);
      // Recorded against the request, not the running attempt.
      await this.deps.audit.record({
        actorId: requester,
        action: prefix === 'dep' ? 'deploy_failed' : 'rollback_failed',
        environment,
        outcome: 'denied',
        correlationId: confirmationId ?? `${prefix}_${uuid()}`,
        details: { code: error.code, runningAttemptId: running.id },
      });
      throw new DeploymentError(error);
    }

    const attempt: DeploymentAttempt = {
      id: `${prefix}_${uuid()}`,
      environment,
      requester,
      commit,
      status: prefix === 'dep' ? DeploymentStatus.Validating : DeploymentStatus.RollingBack,
      steps: [],
      startedAt: new Date().toISOString(),
    };
    this.inFlight.set(environment, attempt);
    return attempt;
  }

  private release(attempt: DeploymentAttempt): void {
    if (this.inFlight.get(attempt.environment) === attempt) {
      this.inFlight.delete(attempt.environment);
    }
    this.cancelRequests.delete(attempt.id);
  }

  private transition(attempt: DeploymentAttempt, target: DeploymentStatus): void {
    const result = transitionDeploymentStatus(attempt.status, target);
    if (!result.success) {
      throw new DeploymentError(
        result.error ?? createTypedError({ code: 'DEPLOY.INVALID_TRANSITION', message: `${attempt.status} -> ${target}` }),
      );
    }
    attempt.status = target;
  }
}
