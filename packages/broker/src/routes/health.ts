/**
 * Health Check Routes
 */

import { Router } from 'express';
import type { RegistryClient } from '@taskmatch/sdk';

export function createHealthRoutes(registry: RegistryClient): Router {
  const router = Router();

  router.get('/health', async (req, res) => {
    const reachable = await registry.healthCheck().catch(() => false);

    res.status(reachable ? 200 : 503).json({
      status: reachable ? 'healthy' : 'unhealthy',
      connections: { registry: reachable },
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
