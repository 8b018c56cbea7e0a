/**
 * Deployment service.
 *
 * The single entry point used by the CLI and the HTTP API. A request is
 * checked by the authorization gate, then either answered (status), run
 * (staging deploy) or turned into a confirmation proposal (production
 * deploy, any rollback). Confirming a proposal runs it.
 */

import { v4 as uuid } from 'uuid';
import { AuditService } from '../audit/audit-service';
import { AuthorizationGate } from '../auth/authorization-gate';
import { ConfirmationFlow } from '../auth/confirmation-flow';
import { AuditEntry } from '../domain/audit';
import { ConfirmationToken } from '../domain/confirmation';
import { DeploymentOutcome } from '../domain/deployment';
import { ENVIRONMENTS, Environment, ImageReference, assertValidCommit } from '../domain/environment';
import { DeploymentError, TypedError, authError, noActiveDeploymentError, toTypedError } from '../domain/errors';
import { DeployRecord } from '../domain/image-state';
import { Action, requiresConfirmation } from '../domain/rbac';
import { HealthChecker } from '../engine/health-checker';
import { DeploymentOrchestrator, RollbackOutcome } from '../engine/orchestrator';
import { ImageStateStore } from '../storage/store';
import { Logger, createLogger } from '../logger';

export interface DeploymentServiceDeps {
  gate: AuthorizationGate;
  confirmations: ConfirmationFlow;
  orchestrator: DeploymentOrchestrator;
  store: ImageStateStore;
  audit: AuditService;
  healthChecker: HealthChecker;
  /** Timeout for the single probe behind a status query. */
  statusProbeTimeoutMs: number;
  logger?: Logger;
}

export interface ActionInput {
  identity: string;
  action: Action;
  environment: Environment;
  commit?: string;
}

export interface EnvironmentStatus {
  environment: Environment;
  current: ImageReference | null;
  previous: ImageReference | null;
  lastDeploy: DeployRecord | null;
  health: { url: string; healthy: boolean; statusCode?: number; error?: string };
  /** Attempt currently running on the environment, if any. */
  activeAttempt?: { id: string; status: string };
  /** Set when the image state could not be read. */
  stateError?: TypedError;
}

export type RequestResult =
  | { kind: 'status'; status: EnvironmentStatus }
  | { kind: 'deployed'; outcome: DeploymentOutcome }
  | { kind: 'proposed'; token: ConfirmationToken; message: string };

export type ConfirmResult =
  | { kind: 'deployed'; outcome: DeploymentOutcome }
  | { kind: 'rolled-back'; outcome: RollbackOutcome };

export class DeploymentService {
  private log: Logger;

  constructor(private deps: DeploymentServiceDeps) {
    this.log = deps.logger ?? createLogger({ component: 'deployment-service' });
  }

  /**
   * Handle a new request. Throws DeploymentError for denials and
   * validation failures, after auditing them.
   */
  async request(input: ActionInput): Promise<RequestResult> {
    const { identity, action, environment } = input;
    const correlationId = `req_${uuid()}`;

    const decision = this.deps.gate.check(identity, action, environment);
    if (!decision.permitted) {
      await this.deny(identity, action, environment, correlationId, decision.reason);
      throw new DeploymentError(authError(decision.reason, { action, environment }));
    }

    if (action === Action.Status) {
      return { kind: 'status', status: await this.status(identity, environment) };
    }

    if (action === Action.Deploy && input.commit !== undefined) {
      try {
        assertValidCommit(input.commit);
      } catch (err) {
        const error = toTypedError(err);
        await this.deps.audit.record({
          actorId: identity,
          action: 'deploy_failed',
          environment,
          outcome: 'denied',
          correlationId,
          details: { code: error.code, reason: error.message },
        });
        throw err;
      }
    }

    if (!requiresConfirmation(action, environment)) {
      // Staging deploys run straight away.
      const outcome = await this.deps.orchestrator.deploy({ requester: identity, environment, commit: input.commit });
      return { kind: 'deployed', outcome };
    }

    const token = this.deps.confirmations.propose({
      requester: identity,
      role: decision.role,
      environment,
      action,
      commit: action === Action.Deploy ? input.commit : undefined,
    });
    await this.deps.audit.record({
      actorId: identity,
      action: action === Action.Rollback ? 'rollback_proposed' : 'deploy_proposed',
      environment,
      outcome: 'success',
      correlationId: token.id,
      details: { commit: input.commit, expiresAt: new Date(token.expiresAt).toISOString() },
    });
    this.log.info('action proposed', { identity, action, environment, tokenId: token.id });

    return { kind: 'proposed', token, message: describeProposal(action, environment, input.commit) };
  }

  /** Confirm a proposal and run it. Throws DeploymentError when the token is refused. */
  async confirm(tokenId: string, identity: string): Promise<ConfirmResult> {
    const result = this.deps.confirmations.confirm(tokenId, identity);
    const environment = result.token?.request.environment;

    if (!result.ok) {
      await this.deps.audit.record({
        actorId: identity,
        action: 'confirmation_rejected',
        environment,
        outcome: 'denied',
        correlationId: tokenId,
        details: { code: result.error.code, reason: result.error.message },
      });
      this.log.warn('confirmation rejected', { tokenId, identity, code: result.error.code });
      throw new DeploymentError(result.error);
    }

    const { request } = result;
    await this.deps.audit.record({
      actorId: identity,
      action: 'confirmation_accepted',
      environment: request.environment,
      outcome: 'success',
      correlationId: tokenId,
      details: { action: request.action, commit: request.commit },
    });

    if (request.action === Action.Rollback) {
      const outcome = await this.deps.orchestrator.rollback({
        requester: identity,
        environment: request.environment,
        confirmationId: tokenId,
      });
      return { kind: 'rolled-back', outcome };
    }

    const outcome = await this.deps.orchestrator.deploy({
      requester: identity,
      environment: request.environment,
      commit: request.commit,
      confirmationId: tokenId,
    });
    return { kind: 'deployed', outcome };
  }

  /** Withdraw a proposal. */
  async cancel(tokenId: string, identity: string): Promise<ConfirmationToken> {
    const result = this.deps.confirmations.cancel(tokenId, identity);
    await this.deps.audit.record({
      actorId: identity,
      action: 'confirmation_cancelled',
      environment: result.token?.request.environment,
      outcome: result.ok ? 'success' : 'denied',
      correlationId: tokenId,
      details: result.ok ? undefined : { code: result.error.code, reason: result.error.message },
    });
    if (!result.ok) throw new DeploymentError(result.error);
    return result.token;
  }

  /**
   * Ask the deploy running on an environment to stop before its next
   * step. Needs deploy rights on that environment. Resolves once the
   * request is registered, not when the attempt ends.
   */
  async cancelAttempt(identity: string, environment: Environment): Promise<{ attemptId: string }> {
    const correlationId = `req_${uuid()}`;
    const decision = this.deps.gate.check(identity, Action.Deploy, environment);
    if (!decision.permitted) {
      await this.deny(identity, Action.Deploy, environment, correlationId, decision.reason);
      throw new DeploymentError(authError(decision.reason, { action: 'cancel', environment }));
    }

    const attemptId = this.deps.orchestrator.cancel(environment, identity);
    if (!attemptId) {
      const error = noActiveDeploymentError(environment);
      await this.deps.audit.record({
        actorId: identity,
        action: 'cancel_requested',
        environment,
        outcome: 'failure',
        correlationId,
        details: { code: error.code },
      });
      throw new DeploymentError(error);
    }

    await this.deps.audit.record({
      actorId: identity,
      action: 'cancel_requested',
      environment,
      outcome: 'success',
      correlationId: attemptId,
    });
    this.log.info('cancellation requested', { identity, environment, attemptId });
    return { attemptId };
  }

  /** Image state, last successful deploy and a single health probe. */
  async status(identity: string, environment: Environment): Promise<EnvironmentStatus> {
    const decision = this.deps.gate.check(identity, Action.Status, environment);
    if (!decision.permitted) {
      await this.deny(identity, Action.Status, environment, `req_${uuid()}`, decision.reason);
      throw new DeploymentError(authError(decision.reason, { action: Action.Status, environment }));
    }

    const { store, healthChecker } = this.deps;
    const [state, lastDeploy, probe] = await Promise.all([
      store.read(environment).then(
        (value) => ({ ok: true as const, value }),
        (err: unknown) => ({ ok: false as const, error: toTypedError(err) }),
      ),
      store.lastSuccess(environment),
      healthChecker.probeOnce(environment, this.deps.statusProbeTimeoutMs),
    ]);

    const active = this.deps.orchestrator.activeAttempt(environment);
    const status: EnvironmentStatus = {
      environment,
      current: state.ok ? state.value.current : null,
      previous: state.ok ? state.value.previous : null,
      lastDeploy,
      health: {
        url: healthChecker.urlFor(environment),
        healthy: probe.healthy,
        statusCode: probe.statusCode,
        error: probe.error,
      },
      activeAttempt: active ? { id: active.id, status: active.status } : undefined,
      stateError: state.ok ? undefined : state.error,
    };

    await this.deps.audit.record({
      actorId: identity,
      action: 'status_checked',
      environment,
      outcome: 'success',
      correlationId: `req_${uuid()}`,
      details: { healthy: probe.healthy, current: status.current },
    });
    return status;
  }

  /**
   * Most recent audit entries, newest last. Without an environment the
   * caller sees only the environments it may query the status of.
   */
  async history(identity: string, limit: number, environment?: Environment): Promise<AuditEntry[]> {
    if (environment !== undefined) {
      const decision = this.deps.gate.check(identity, Action.Status, environment);
      if (!decision.permitted) {
        await this.deny(identity, Action.Status, environment, `req_${uuid()}`, decision.reason);
        throw new DeploymentError(authError(decision.reason, { action: 'history', environment }));
      }
      return this.deps.audit.query({ environment, limit });
    }

    const visible = ENVIRONMENTS.filter((env) => this.deps.gate.check(identity, Action.Status, env).permitted);
    if (visible.length === 0) {
      const decision = this.deps.gate.check(identity, Action.Status, Environment.Staging);
      const reason = decision.permitted ? `Identity "${identity}" may not read the audit log` : decision.reason;
      await this.deny(identity, Action.Status, undefined, `req_${uuid()}`, reason);
      throw new DeploymentError(authError(reason, { action: 'history' }));
    }
    if (visible.length === ENVIRONMENTS.length) {
      return this.deps.audit.query({ limit });
    }
    return this.deps.audit.query({ environments: visible, limit });
  }

  private async deny(
    identity: string,
    action: Action,
    environment: Environment | undefined,
    correlationId: string,
    reason: string,
  ): Promise<void> {
    this.log.warn('request denied', { identity, action, environment, reason });
    await this.deps.audit.record({
      actorId: identity,
      action: 'authorization_denied',
      environment,
      outcome: 'denied',
      correlationId,
      details: { action, reason },
    });
  }
}

function describeProposal(action: Action, environment: Environment, commit?: string): string {
  if (action === Action.Rollback) {
    return `Roll back ${environment} to its previous image? Confirm to proceed.`;
  }
  return `Deploy ${commit ? `commit ${commit}` : 'the branch head'} to ${environment}? Confirm to proceed.`;
}
