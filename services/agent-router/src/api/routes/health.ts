import { Router, Request, Response } from 'express';
import { HealthMonitor } from '../../monitoring/health-monitor.js';
import { PoolManager } from '../../services/pool-manager.js';

/**
 * Create health check routes
 * @param poolManager - Pool manager instance
 * @param healthMonitor - Aggregates pool status for the gateway
 * @returns Express router with health endpoints
 */
export function createHealthRoutes(poolManager: PoolManager, healthMonitor: HealthMonitor): Router {
  const router = Router();

  /**
   * Pool health, per model and pool-wide
   */
  router.get('/', (req: Request, res: Response): void => {
    res.json(healthMonitor.getHealthReport(poolManager.getPool()));
  });

  /**
   * Liveness check endpoint
   */
  router.get('/live', (req: Request, res: Response): void => {
    res.json({
      status: 'alive',
      message: 'Service is alive',
      timestamp: new Date().toISOString(),
      uptime: healthMonitor.getUptime(),
    });
  });

  return router;
}
