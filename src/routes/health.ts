import { Router, Request, Response } from 'express';
import type { HealthResponse } from '../types/index.js';
import type { DispatchPool } from '../lib/dispatch-pool.js';

export const SERVICE_NAME = 'responses-bridge';

// Track server start time
const startTime = Date.now();

/**
 * Create health router with dispatch pool access
 */
export function createHealthRouter(dispatchPool?: DispatchPool): Router {
  const router = Router();

  /**
   * GET /health
   * Returns server health status. No authentication required.
   */
  router.get('/health', (_req: Request, res: Response) => {
    const uptimeSeconds = Math.floor((Date.now() - startTime) / 1000);

    const isHealthy = dispatchPool ? dispatchPool.isHealthy() : true;

    const response: HealthResponse = {
      status: isHealthy ? 'ok' : 'degraded',
      service: SERVICE_NAME,
      uptime: uptimeSeconds,
    };

    if (dispatchPool) {
      const stats = dispatchPool.getStats();
      response.queue = {
        pending: stats.pending,
        processing: stats.processing,
        concurrency: stats.concurrency,
      };
    }

    res.json(response);
  });

  return router;
}
