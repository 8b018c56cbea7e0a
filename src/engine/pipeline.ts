/**
 * Pipeline collaborator boundary.
 *
 * The orchestrator never builds, pushes or deploys anything itself; it
 * calls these capabilities in order. Each call runs to completion or
 * throws, and must stop when its AbortSignal fires (the step timed out).
 */

import { Environment, ImageReference } from '../domain/environment';

export interface CheckoutInput {
  environment: Environment;
  /** Requested commit; when absent the head of the environment's branch is used. */
  commit?: string;
}

export interface BuildInput {
  environment: Environment;
  commit: string;
  /** ISO-8601 build time, stamped into the image. */
  timestamp: string;
}

export interface PushInput {
  environment: Environment;
  artifactTag: string;
}

export interface DeployTargetInput {
  environment: Environment;
  imageReference: ImageReference;
}

export interface PipelineSteps {
  checkout(input: CheckoutInput, signal: AbortSignal): Promise<{ commit: string }>;
  build(input: BuildInput, signal: AbortSignal): Promise<{ artifactTag: string }>;
  push(input: PushInput, signal: AbortSignal): Promise<{ imageReference: ImageReference }>;
  deployTarget(input: DeployTargetInput, signal: AbortSignal): Promise<void>;
}

/** Upper bound for each external step, in milliseconds. */
export interface StepTimeouts {
  checkoutMs: number;
  buildMs: number;
  pushMs: number;
  deployTargetMs: number;
}

export const DEFAULT_STEP_TIMEOUTS: Readonly<StepTimeouts> = {
  checkoutMs: 120_000,
  buildMs: 1_800_000,
  pushMs: 600_000,
  deployTargetMs: 600_000,
};

/**
 * Error a pipeline step throws to report a typed failure, e.g. a command
 * that exited non-zero.
 */
export class PipelineStepError extends Error {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'PipelineStepError';
  }
}
