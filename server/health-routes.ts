/**
 * Health Routes
 *
 * GET /health           → 200 when no check is down, 503 otherwise
 * GET /health/consumer  → outbox consumer counters
 *
 * Response shape of /health:
 * {
 *   status: "healthy" | "unhealthy";
 *   pipeline: string;
 *   checks: ServiceHealthCheck[];
 *   checkedAt: string; // ISO timestamp
 * }
 */

import { Router } from 'express';
import { createLogger, errorMessage } from './logger';
import { checkAllServices, isHealthy, type HealthDependencies } from './service-health';

const log = createLogger('HealthRoutes');

export interface HealthRouterOptions extends HealthDependencies {
  pipelineName: string;
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const checks = await checkAllServices(options);
      const healthy = isHealthy(checks);
      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'healthy' : 'unhealthy',
        pipeline: options.pipelineName,
        checks,
        checkedAt: new Date().toISOString(),
      });
    } catch (err) {
      log.error('Health check failed', { error: errorMessage(err) });
      res.status(500).json({ error: 'Health check failed' });
    }
  });

  router.get('/health/consumer', (_req, res) => {
    res.json({ pipeline: options.pipelineName, ...options.consumer.getStats() });
  });

  return router;
}
