/**
 * Step runner: executes one pipeline step under a timeout.
 *
 * A step that outlives its budget is failed with STEP.TIMEOUT and its
 * AbortSignal is fired so the underlying command can be stopped.
 */

import { DeploymentStatus, StepOutcome, StepStatus } from '../domain/deployment';
import { TypedError, stepFailedError, stepTimeoutError, toTypedError, DeploymentError } from '../domain/errors';
import { PipelineStepError } from './pipeline';

export type StepRunResult<T> =
  | { ok: true; value: T; outcome: StepOutcome }
  | { ok: false; error: TypedError; outcome: StepOutcome };

/** Run a step function, converting throws and timeouts into a StepOutcome. */
export async function runStep<T>(
  step: DeploymentStatus,
  timeoutMs: number | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
  describe?: (value: T) => Record<string, unknown>,
): Promise<StepRunResult<T>> {
  const startedAt = new Date();
  const controller = new AbortController();

  const finish = (status: StepStatus, extra: Partial<StepOutcome>): StepOutcome => {
    const completedAt = new Date();
    return {
      step,
      status,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      ...extra,
    };
  };

  try {
    const value = timeoutMs === undefined
      ? await fn(controller.signal)
      : await executeWithTimeout(fn, controller, timeoutMs);
    return { ok: true, value, outcome: finish(StepStatus.Succeeded, { outputs: describe?.(value) }) };
  } catch (err) {
    const error = toStepError(step, err);
    return { ok: false, error, outcome: finish(StepStatus.Failed, { error }) };
  }
}

function toStepError(step: DeploymentStatus, err: unknown): TypedError {
  if (err instanceof TimeoutError) {
    return stepTimeoutError(step, err.timeoutMs);
  }
  if (err instanceof PipelineStepError) {
    return stepFailedError(step, err.message, err.details);
  }
  if (err instanceof DeploymentError) {
    return { ...err.typedError, step: err.typedError.step ?? step };
  }
  return { ...toTypedError(err, 'STEP.FAILED'), step };
}

/** Execute a function with a timeout, aborting its signal when the timeout fires. */
async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  controller: AbortController,
  timeoutMs: number,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    fn(controller.signal)
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Step execution timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
