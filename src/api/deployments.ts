/**
 * Deployment API routes.
 *
 * POST /deployments                           Deploy (staging runs, production is proposed)
 * POST /environments/:environment/rollback    Propose a rollback
 * POST /environments/:environment/cancel      Stop the running deploy before its next step
 * GET  /environments/:environment/status      Image state and health
 */

import { Response, Router } from 'express';
import { z } from 'zod';
import { ConfirmationToken } from '../domain/confirmation';
import { Environment, parseEnvironment } from '../domain/environment';
import { Action } from '../domain/rbac';
import { DeploymentService, RequestResult } from '../service/deployment-service';
import { IdentifiedRequest, handle, requireIdentity } from './middleware';

const DeployBodySchema = z.object({
  environment: z.string(),
  commit: z.string().optional(),
});

/** Wire shape of a pending confirmation. */
export function presentToken(token: ConfirmationToken) {
  return {
    tokenId: token.id,
    action: token.request.action,
    environment: token.request.environment,
    commit: token.request.commit,
    status: token.status,
    expiresAt: new Date(token.expiresAt).toISOString(),
  };
}

export function createDeploymentRoutes(service: DeploymentService): Router {
  const router = Router();

  router.post('/deployments', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const body = DeployBodySchema.parse(req.body ?? {});
    const environment = parseEnvironment(body.environment);
    const result = await service.request({ identity, action: Action.Deploy, environment, commit: body.commit });
    respond(res, result);
  }));

  router.post('/environments/:environment/rollback', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const environment = parseEnvironment(req.params.environment);
    const result = await service.request({ identity, action: Action.Rollback, environment });
    respond(res, result);
  }));

  router.post('/environments/:environment/cancel', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const environment = parseEnvironment(req.params.environment);
    const { attemptId } = await service.cancelAttempt(identity, environment);
    res.status(202).json({ attemptId, message: `Cancellation of ${attemptId} requested; it stops before its next step.` });
  }));

  router.get('/environments/:environment/status', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const environment: Environment = parseEnvironment(req.params.environment);
    const status = await service.status(identity, environment);
    res.json({ status });
  }));

  return router;
}

function respond(res: Response, result: RequestResult): void {
  switch (result.kind) {
    case 'proposed':
      res.status(202).json({ confirmation: presentToken(result.token), message: result.message });
      return;
    case 'deployed':
      res.json({ outcome: result.outcome });
      return;
    case 'status':
      res.json({ status: result.status });
      return;
  }
}
