/**
 * Audit API routes.
 *
 * GET /audit?limit=20&environment=staging  Most recent audit entries
 */

import { Router } from 'express';
import { z } from 'zod';
import { Environment } from '../domain/environment';
import { DeploymentService } from '../service/deployment-service';
import { IdentifiedRequest, handle, requireIdentity } from './middleware';

const AuditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(20),
  environment: z.nativeEnum(Environment).optional(),
});

export function createAuditRoutes(service: DeploymentService): Router {
  const router = Router();

  router.get('/audit', handle(async (req: IdentifiedRequest, res) => {
    const identity = requireIdentity(req);
    const query = AuditQuerySchema.parse(req.query);
    const entries = await service.history(identity, query.limit, query.environment);
    res.json({ entries });
  }));

  return router;
}
