/**
 * Confirmation API routes.
 *
 * POST /confirmations/:tokenId/confirm  Run a proposed action
 * POST /confirmations/:tokenId/cancel   Withdraw it
 */

import { Router } from 'express';
import { DeploymentService } from '../service/deployment-service';
import { presentToken } from './deployments';
import { IdentifiedRequest, handle, requireIdentity } from './middleware';

export function createConfirmationRoutes(service: DeploymentService): Router {
  const router = Router();

  router.post('/confirmations/:tokenId/confirm', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const result = await service.confirm(req.params.tokenId, identity);
    if (result.kind === 'rolled-back') {
      res.json({ rollback: result.outcome });
    } else {
      res.json({ outcome: result.outcome });
    }
  }));

  router.post('/confirmations/:tokenId/cancel', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const token = await service.cancel(req.params.tokenId, identity);
    res.json({ confirmation: presentToken(token) });
  }));

  return router;
}
