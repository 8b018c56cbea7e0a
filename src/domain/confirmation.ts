/**
 * Confirmation token model for two-phase destructive actions.
 */

import { ActionRequest, Role } from './rbac';

/** Token lifecycle. Only Proposed is non-terminal. */
export enum ConfirmationStatus {
  Proposed = 'proposed',
  Confirmed = 'confirmed',
  Cancelled = 'cancelled',
  Expired = 'expired',
}

export const VALID_CONFIRMATION_TRANSITIONS: Record<ConfirmationStatus, ConfirmationStatus[]> = {
  [ConfirmationStatus.Proposed]: [
    ConfirmationStatus.Confirmed,
    ConfirmationStatus.Cancelled,
    ConfirmationStatus.Expired,
  ],
  [ConfirmationStatus.Confirmed]: [],
  [ConfirmationStatus.Cancelled]: [],
  [ConfirmationStatus.Expired]: [],
};

/** Single-use correlation id binding a proposed request to its confirmation. */
export interface ConfirmationToken {
  id: string;
  request: ActionRequest;
  /** Role of the requester when the action was proposed. */
  roleSnapshot: Role;
  createdAt: number;
  expiresAt: number;
  status: ConfirmationStatus;
}
