/**
 * Audit trail domain model.
 *
 * Immutable, hash-chained records of authorization decisions and
 * pipeline transitions.
 */

import { Environment } from './environment';

/** Audit event names. */
export const AUDIT_ACTIONS = [
  // Authorization / confirmation
  'authorization_denied',
  'deploy_proposed',
  'rollback_proposed',
  'confirmation_accepted',
  'confirmation_rejected',
  'confirmation_cancelled',
  // Pipeline
  'deploy_started',
  'step_started',
  'step_succeeded',
  'step_failed',
  'deploy_success',
  'deploy_failed',
  'deploy_canceled',
  'cancel_requested',
  // Rollback
  'rollback_started',
  'rollback_success',
  'rollback_failed',
  'rollback_denied',
  // State / queries
  'state_corrupted',
  'status_checked',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

/** Audit outcome. */
export type AuditOutcome = 'success' | 'failure' | 'denied';

/** An immutable audit record. */
export interface AuditEntry {
  id: string;
  /** Position in the chain, starting at 1. */
  sequence: number;
  timestamp: string;
  /** Requester identity. */
  actorId: string;
  action: AuditAction;
  environment?: Environment;
  outcome: AuditOutcome;
  /** Attempt id or confirmation token id tying related entries together. */
  correlationId: string;
  details?: Record<string, unknown>;
  /** Hash of the previous entry ("" for the first). */
  prevHash: string;
  /** sha256 over prevHash and the entry's own fields. */
  hash: string;
}
