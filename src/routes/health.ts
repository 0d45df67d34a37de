import { Router } from 'express';
import { getHealthStatus, type HealthDependencies } from '../infrastructure/healthCheck';
import { asyncHandler } from '../middleware/errorHandler';

export function createHealthRouter(deps: HealthDependencies): Router {
  const router = Router();

  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const health = await getHealthStatus(deps);
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    }),
  );

  return router;
}
