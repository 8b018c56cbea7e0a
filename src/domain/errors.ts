/**
 * Typed error model for machine-actionable error handling.
 *
 * Failures inside the pipeline are carried as TypedError values on step
 * outcomes and audit entries. Where an operation has to abort, the value
 * travels inside a DeploymentError so callers can still read the code.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'AUTH'
  | 'STEP'
  | 'HEALTH'
  | 'ROLLBACK'
  | 'STATE'
  | 'DEPLOY'
  | 'SYSTEM';

/** Typed suggested fix that an operator (or a script) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and outcomes. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Pipeline step the error belongs to, if any. */
  step?: string;
  /** Deployment attempt the error belongs to, if any. */
  attemptId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  step?: string;
  attemptId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    step: params.step,
    attemptId: params.attemptId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Exception wrapper for a TypedError. */
export class DeploymentError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'DeploymentError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Convert anything thrown into a TypedError, keeping codes that are already typed. */
export function toTypedError(err: unknown, fallbackCode = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof DeploymentError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
  });
}

// --- Validation ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    details,
    suggestedFixes: fixes,
  });
}

export function invalidEnvironmentError(value: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.ENVIRONMENT',
    message: `Invalid environment "${value}". Must be: staging or production`,
    details: { value },
  });
}

export function invalidCommitError(value: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.COMMIT',
    message: `Invalid commit hash format: "${value}"`,
    details: { value },
    suggestedFixes: [
      { type: 'USE_HEX_SHA', params: { minLength: 4, maxLength: 40 }, description: 'Pass a 4-40 character lowercase hex commit id' },
    ],
  });
}

export function invalidImageError(value: string, reason: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.IMAGE',
    message: `Invalid image reference "${value}": ${reason}`,
    details: { value },
  });
}

// --- Authorization ---

export function authError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'AUTH.FORBIDDEN',
    message,
    details,
  });
}

export function tokenError(
  code: 'AUTH.TOKEN_UNKNOWN' | 'AUTH.TOKEN_CONSUMED' | 'AUTH.TOKEN_EXPIRED' | 'AUTH.CONTEXT_MISMATCH',
  message: string,
  tokenId: string,
): TypedError {
  return createTypedError({
    code,
    message,
    details: { tokenId },
  });
}

// --- Pipeline ---

export function stepFailedError(step: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'STEP.FAILED',
    message,
    step,
    details,
  });
}

export function stepTimeoutError(step: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'STEP.TIMEOUT',
    message: `Step "${step}" timed out after ${timeoutMs}ms`,
    step,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function stepCanceledError(step: string, canceledBy?: string): TypedError {
  return createTypedError({
    code: 'STEP.CANCELED',
    message: canceledBy ? `Deployment canceled by ${canceledBy} before "${step}"` : `Deployment canceled before "${step}"`,
    step,
    details: canceledBy ? { canceledBy } : undefined,
  });
}

export function healthExhaustedError(url: string, attempts: number, lastStatusCode?: number): TypedError {
  return createTypedError({
    code: 'HEALTH.EXHAUSTED',
    message: `Health check failed after ${attempts} attempts`,
    step: 'health-checking',
    retryable: true,
    details: { url, attempts, lastStatusCode },
  });
}

// --- Rollback / state ---

export function noPreviousImageError(environment: string): TypedError {
  return createTypedError({
    code: 'ROLLBACK.NO_PREVIOUS_IMAGE',
    message: `No previous image found for ${environment}. Cannot rollback.`,
    details: { environment },
  });
}

export function rollbackFailedError(environment: string, message: string, cause?: TypedError): TypedError {
  return createTypedError({
    code: 'ROLLBACK.FAILED',
    message,
    details: { environment, cause },
    suggestedFixes: [
      { type: 'MANUAL_INTERVENTION', params: { environment }, description: `Inspect ${environment} by hand; its running image is unknown` },
    ],
  });
}

export function stateCorruptionError(environment: string, reason: string): TypedError {
  return createTypedError({
    code: 'STATE.CORRUPTION',
    message: `Image state for ${environment} is corrupt: ${reason}`,
    details: { environment, reason },
    suggestedFixes: [
      { type: 'REPAIR_STATE_FILES', params: { environment }, description: 'Repair the image state files before deploying again' },
    ],
  });
}

export function deploymentInProgressError(environment: string, attemptId: string): TypedError {
  return createTypedError({
    code: 'DEPLOY.IN_PROGRESS',
    message: `A deployment to ${environment} is already in progress`,
    retryable: true,
    details: { environment, attemptId },
  });
}

export function noActiveDeploymentError(environment: string): TypedError {
  return createTypedError({
    code: 'DEPLOY.NOT_RUNNING',
    message: `No cancellable deployment is running on ${environment}`,
    details: { environment },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of the given secrets in a message with its
 * masked form. Used on command output before it reaches logs or errors.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of the secret
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
