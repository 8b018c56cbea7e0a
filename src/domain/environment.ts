/**
 * Deployment environments and the identifiers that flow through the pipeline.
 */

import { DeploymentError, invalidCommitError, invalidEnvironmentError, invalidImageError } from './errors';

/** Deployment targets, in promotion order. */
export enum Environment {
  Staging = 'staging',
  Production = 'production',
}

export const ENVIRONMENTS: readonly Environment[] = [Environment.Staging, Environment.Production];

/** Opaque registry path + tag. */
export type ImageReference = string;

// 4-40 lowercase hex characters: short or full SHA.
const COMMIT_PATTERN = /^[0-9a-f]{4,40}$/;

export function isEnvironment(value: unknown): value is Environment {
  return typeof value === 'string' && (ENVIRONMENTS as readonly string[]).includes(value);
}

/** Parse an environment name, throwing VALIDATION.ENVIRONMENT on anything else. */
export function parseEnvironment(value: string): Environment {
  if (!isEnvironment(value)) {
    throw new DeploymentError(invalidEnvironmentError(value));
  }
  return value;
}

export function isValidCommit(value: string): boolean {
  return COMMIT_PATTERN.test(value);
}

/** Validate a commit identifier, throwing VALIDATION.COMMIT when malformed. */
export function assertValidCommit(value: string): string {
  if (!isValidCommit(value)) {
    throw new DeploymentError(invalidCommitError(value));
  }
  return value;
}

/** Image references are only checked for content; the core never parses them. */
export function assertValidImage(value: string): ImageReference {
  if (value.trim().length === 0) {
    throw new DeploymentError(invalidImageError(value, 'must not be empty'));
  }
  if (/[\r\n]/.test(value)) {
    throw new DeploymentError(invalidImageError(value, 'must be a single line'));
  }
  return value;
}
