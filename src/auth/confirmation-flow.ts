/**
 * Two-phase confirmation for destructive actions.
 *
 * propose() hands out a single-use token; confirm() accepts it exactly
 * once, and only from the proposer, only within the expiry window, and
 * only if a fresh authorization check still grants the same role. The
 * token is settled synchronously before confirm() returns, so a second
 * presentation of the same token can never run the action again.
 */

import { v4 as uuid } from 'uuid';
import {
  ConfirmationStatus,
  ConfirmationToken,
  VALID_CONFIRMATION_TRANSITIONS,
} from '../domain/confirmation';
import { DeploymentError, TypedError, authError, tokenError } from '../domain/errors';
import { ActionRequest } from '../domain/rbac';
import { AuthorizationGate } from './authorization-gate';

export interface ConfirmationFlowOptions {
  /** How long a proposal stays confirmable. */
  ttlMs: number;
  /** Clock, in epoch milliseconds. */
  now?: () => number;
}

export type ConfirmationResult =
  | { ok: true; token: ConfirmationToken; request: ActionRequest }
  | { ok: false; token?: ConfirmationToken; error: TypedError };

export class ConfirmationFlow {
  private tokens = new Map<string, ConfirmationToken>();
  private now: () => number;

  constructor(
    private gate: AuthorizationGate,
    private options: ConfirmationFlowOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  /** Register a proposed action. The request must pass the gate as it stands now. */
  propose(request: ActionRequest): ConfirmationToken {
    this.sweep();
    const decision = this.gate.check(request.requester, request.action, request.environment);
    if (!decision.permitted) {
      throw new DeploymentError(authError(decision.reason, { action: request.action, environment: request.environment }));
    }

    const createdAt = this.now();
    const token: ConfirmationToken = {
      id: `cfm_${uuid()}`,
      request: Object.freeze({ ...request, role: decision.role }),
      roleSnapshot: decision.role,
      createdAt,
      expiresAt: createdAt + this.options.ttlMs,
      status: ConfirmationStatus.Proposed,
    };
    this.tokens.set(token.id, token);
    return { ...token };
  }

  /** Confirm a proposal. Consumes the token whatever the result. */
  confirm(tokenId: string, identity: string): ConfirmationResult {
    const settled = this.settle(tokenId);
    if (!settled.ok) return settled;
    const { token } = settled;

    if (token.request.requester !== identity) {
      this.transition(token, ConfirmationStatus.Cancelled);
      return {
        ok: false,
        token: { ...token },
        error: tokenError('AUTH.CONTEXT_MISMATCH', 'Confirmation must come from the identity that proposed the action', tokenId),
      };
    }

    const decision = this.gate.check(identity, token.request.action, token.request.environment);
    if (!decision.permitted) {
      this.transition(token, ConfirmationStatus.Cancelled);
      return { ok: false, token: { ...token }, error: authError(decision.reason, { tokenId }) };
    }
    if (decision.role !== token.roleSnapshot) {
      this.transition(token, ConfirmationStatus.Cancelled);
      return {
        ok: false,
        token: { ...token },
        error: tokenError('AUTH.CONTEXT_MISMATCH', `Role changed from "${token.roleSnapshot}" to "${decision.role}" since the action was proposed`, tokenId),
      };
    }

    this.transition(token, ConfirmationStatus.Confirmed);
    return { ok: true, token: { ...token }, request: token.request };
  }

  /** Cancel a proposal. Only the proposer can cancel. */
  cancel(tokenId: string, identity: string): ConfirmationResult {
    const existing = this.tokens.get(tokenId);
    if (existing && existing.request.requester !== identity) {
      return {
        ok: false,
        error: tokenError('AUTH.CONTEXT_MISMATCH', 'Only the identity that proposed the action can cancel it', tokenId),
      };
    }
    const settled = this.settle(tokenId);
    if (!settled.ok) return settled;
    this.transition(settled.token, ConfirmationStatus.Cancelled);
    return { ok: true, token: { ...settled.token }, request: settled.token.request };
  }

  /** Snapshot of a token, with expiry applied. */
  get(tokenId: string): ConfirmationToken | undefined {
    const token = this.tokens.get(tokenId);
    if (!token) return undefined;
    this.expireIfDue(token);
    return { ...token };
  }

  /**
   * Forget tokens whose window has passed, whatever their status. Settled
   * tokens are kept until then so a replay still reads as consumed.
   * Runs on every propose(). Returns how many were removed.
   */
  sweep(): number {
    let removed = 0;
    const now = this.now();
    for (const [id, token] of this.tokens) {
      if (now >= token.expiresAt) {
        this.tokens.delete(id);
        removed++;
      }
    }
    return removed;
  }

  /** Number of tokens currently held. */
  get size(): number {
    return this.tokens.size;
  }

  /** Look up a token that is still open, expiring it first if its window has passed. */
  private settle(tokenId: string): { ok: true; token: ConfirmationToken } | { ok: false; token?: ConfirmationToken; error: TypedError } {
    const token = this.tokens.get(tokenId);
    if (!token) {
      return { ok: false, error: tokenError('AUTH.TOKEN_UNKNOWN', 'Unknown confirmation token', tokenId) };
    }
    this.expireIfDue(token);

    switch (token.status) {
      case ConfirmationStatus.Proposed:
        return { ok: true, token };
      case ConfirmationStatus.Expired:
        return { ok: false, token: { ...token }, error: tokenError('AUTH.TOKEN_EXPIRED', 'Confirmation token has expired', tokenId) };
      default:
        return {
          ok: false,
          token: { ...token },
          error: tokenError('AUTH.TOKEN_CONSUMED', `Confirmation token was already ${token.status}`, tokenId),
        };
    }
  }

  private expireIfDue(token: ConfirmationToken): void {
    if (token.status === ConfirmationStatus.Proposed && this.now() >= token.expiresAt) {
      this.transition(token, ConfirmationStatus.Expired);
    }
  }

  private transition(token: ConfirmationToken, target: ConfirmationStatus): void {
    if (!VALID_CONFIRMATION_TRANSITIONS[token.status].includes(target)) {
      throw new Error(`Invalid confirmation transition: ${token.status} -> ${target}`);
    }
    token.status = target;
  }
}
