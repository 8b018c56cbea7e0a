/**
 * Rollback controller.
 *
 * Swaps the image state back, redeploys the restored image and runs one
 * health-check pass with the normal budget. It never rolls back twice: a
 * rollback whose own deploy or health check fails is reported as failed
 * and left for manual intervention.
 */

import { AuditTrail } from '../audit/audit-service';
import { DeploymentStatus, StepOutcome, StepStatus } from '../domain/deployment';
import { Environment, ImageReference } from '../domain/environment';
import {
  TypedError,
  healthExhaustedError,
  rollbackFailedError,
  toTypedError,
} from '../domain/errors';
import { ImageStateStore } from '../storage/store';
import { Logger, createLogger } from '../logger';
import { HealthChecker, HealthCheckPolicy } from './health-checker';
import { PipelineSteps, StepTimeouts } from './pipeline';
import { runStep } from './step-runner';

export type RollbackResult =
  | { success: true; image: ImageReference; steps: StepOutcome[] }
  | { success: false; error: TypedError; image?: ImageReference; steps: StepOutcome[] };

export interface RollbackControllerDeps {
  store: ImageStateStore;
  steps: PipelineSteps;
  healthChecker: HealthChecker;
  healthPolicy: HealthCheckPolicy;
  timeouts: StepTimeouts;
  logger?: Logger;
}

export class RollbackController {
  private log: Logger;

  constructor(private deps: RollbackControllerDeps) {
    this.log = deps.logger ?? createLogger({ component: 'rollback' });
  }

  async execute(environment: Environment, trail: AuditTrail): Promise<RollbackResult> {
    const steps: StepOutcome[] = [];
    trail.append('rollback_started', 'success');

    let image: ImageReference;
    const startedAt = new Date();
    try {
      image = await this.deps.store.rollback(environment);
    } catch (err) {
      const error = toTypedError(err, 'ROLLBACK.FAILED');
      steps.push(stateStep(startedAt, StepStatus.Failed, error));
      if (error.code === 'ROLLBACK.NO_PREVIOUS_IMAGE') {
        trail.append('rollback_denied', 'failure', { code: error.code, reason: error.message });
      } else {
        trail.append('rollback_failed', 'failure', { code: error.code, reason: error.message });
      }
      this.log.error('rollback could not restore image state', { environment, code: error.code });
      return { success: false, error, steps };
    }
    steps.push(stateStep(startedAt, StepStatus.Succeeded, undefined, { image }));
    this.log.info('image state restored, redeploying', { environment, image });

    const deployed = await runStep(DeploymentStatus.DeployingTarget, this.deps.timeouts.deployTargetMs, (signal) =>
      this.deps.steps.deployTarget({ environment, imageReference: image }, signal),
    );
    steps.push(deployed.outcome);
    if (!deployed.ok) {
      const error = rollbackFailedError(environment, `Redeploying ${image} failed: ${deployed.error.message}`, deployed.error);
      trail.append('rollback_failed', 'failure', { image, code: deployed.error.code, reason: deployed.error.message });
      return { success: false, error, image, steps };
    }

    const healthStartedAt = new Date();
    const health = await this.deps.healthChecker.poll(environment, this.deps.healthPolicy);
    const healthCompletedAt = new Date();
    const healthStep: StepOutcome = {
      step: DeploymentStatus.HealthChecking,
      status: health.status === 'healthy' ? StepStatus.Succeeded : StepStatus.Failed,
      startedAt: healthStartedAt.toISOString(),
      completedAt: healthCompletedAt.toISOString(),
      durationMs: healthCompletedAt.getTime() - healthStartedAt.getTime(),
      outputs: { attempts: health.attempts },
    };

    if (health.status === 'unhealthy') {
      const cause = healthExhaustedError(health.url, health.attempts, health.lastStatusCode);
      healthStep.error = cause;
      steps.push(healthStep);
      const error = rollbackFailedError(environment, `Restored image ${image} failed its health check`, cause);
      trail.append('rollback_failed', 'failure', { image, code: cause.code, attempts: health.attempts });
      return { success: false, error, image, steps };
    }

    steps.push(healthStep);
    trail.append('rollback_success', 'success', { image, healthAttempts: health.attempts });
    return { success: true, image, steps };
  }
}

function stateStep(
  startedAt: Date,
  status: StepStatus,
  error?: TypedError,
  outputs?: Record<string, unknown>,
): StepOutcome {
  const completedAt = new Date();
  return {
    step: DeploymentStatus.RollingBack,
    status,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    durationMs: completedAt.getTime() - startedAt.getTime(),
    error,
    outputs,
  };
}
