/**
 * Deployment state machine.
 *
 * Enforces valid state transitions for deployment attempts,
 * producing typed errors on invalid transitions.
 */

import { DeploymentStatus, VALID_DEPLOYMENT_TRANSITIONS } from '../domain/deployment';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a deployment state transition. */
export function transitionDeploymentStatus(
  current: DeploymentStatus,
  target: DeploymentStatus,
): TransitionResult<DeploymentStatus> {
  const validTargets = VALID_DEPLOYMENT_TRANSITIONS[current];
  if (!validTargets || !validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'DEPLOY.INVALID_TRANSITION',
        message: `Invalid deployment state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/**
 * Check if a deployment status is terminal. Failed counts as terminal: it is
 * only left for RollingBack when the attempt had already rotated the image state.
 */
export function isTerminalDeploymentStatus(status: DeploymentStatus): boolean {
  return (
    status === DeploymentStatus.Success ||
    status === DeploymentStatus.Failed ||
    status === DeploymentStatus.RolledBack ||
    status === DeploymentStatus.RollbackFailed
  );
}
