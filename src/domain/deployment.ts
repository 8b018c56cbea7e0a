/**
 * Deployment attempt domain model.
 *
 * One attempt is one orchestrator run: from a validated request to a
 * terminal status, with an ordered record of the steps it went through.
 */

import { Environment, ImageReference } from './environment';
import { TypedError } from './errors';

/** Orchestrator states, in pipeline order. */
export enum DeploymentStatus {
  Validating = 'validating',
  Building = 'building',
  Pushing = 'pushing',
  RecordingState = 'recording-state',
  DeployingTarget = 'deploying-target',
  HealthChecking = 'health-checking',
  RollingBack = 'rolling-back',
  Success = 'success',
  Failed = 'failed',
  RolledBack = 'rolled-back',
  RollbackFailed = 'rollback-failed',
}

/**
 * Valid state transitions.
 *
 * Failed is terminal unless the rotation already committed, in which case
 * the orchestrator moves on to RollingBack.
 */
export const VALID_DEPLOYMENT_TRANSITIONS: Record<DeploymentStatus, DeploymentStatus[]> = {
  [DeploymentStatus.Validating]: [DeploymentStatus.Building, DeploymentStatus.Failed],
  [DeploymentStatus.Building]: [DeploymentStatus.Pushing, DeploymentStatus.Failed],
  [DeploymentStatus.Pushing]: [DeploymentStatus.RecordingState, DeploymentStatus.Failed],
  [DeploymentStatus.RecordingState]: [DeploymentStatus.DeployingTarget, DeploymentStatus.Failed],
  [DeploymentStatus.DeployingTarget]: [DeploymentStatus.HealthChecking, DeploymentStatus.Failed],
  [DeploymentStatus.HealthChecking]: [DeploymentStatus.Success, DeploymentStatus.Failed],
  [DeploymentStatus.Failed]: [DeploymentStatus.RollingBack],
  [DeploymentStatus.RollingBack]: [DeploymentStatus.RolledBack, DeploymentStatus.RollbackFailed],
  [DeploymentStatus.Success]: [],
  [DeploymentStatus.RolledBack]: [],
  [DeploymentStatus.RollbackFailed]: [],
};

/** Step-level outcome states. */
export enum StepStatus {
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

/** Outcome of one pipeline step. */
export interface StepOutcome {
  step: DeploymentStatus;
  status: StepStatus;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  error?: TypedError;
  /** Step-specific results (resolved commit, image reference, attempts). */
  outputs?: Record<string, unknown>;
}

/** The unit of work for one orchestrator run. */
export interface DeploymentAttempt {
  id: string;
  environment: Environment;
  requester: string;
  /** Requested commit; replaced by the resolved one after checkout. */
  commit?: string;
  /** Target image, known once the build produced it. */
  imageReference?: ImageReference;
  status: DeploymentStatus;
  steps: StepOutcome[];
  startedAt: string;
  completedAt?: string;
  canceledBy?: string;
}

/** Terminal summary handed back to the caller. */
export interface DeploymentOutcome {
  attemptId: string;
  environment: Environment;
  status: DeploymentStatus;
  commit?: string;
  imageReference?: ImageReference;
  /** Image restored by an automatic rollback. */
  restoredImage?: ImageReference;
  steps: StepOutcome[];
  error?: TypedError;
  rollbackError?: TypedError;
  /** Non-fatal problems, such as audit writes that did not persist. */
  warnings: string[];
  /** One human-readable line describing the result. */
  message: string;
  /** True when the environment needs a human to look at it. */
  requiresManualIntervention: boolean;
}
