import { Router, Request, Response } from 'express';
import { PoolManager } from '../../services/pool-manager.js';

/**
 * Create agent listing routes
 * @param poolManager - Pool manager instance
 * @returns Express router with agent endpoints
 */
export function createAgentRoutes(poolManager: PoolManager): Router {
  const router = Router();

  /**
   * All loaded agents, enabled or not
   */
  router.get('/', (req: Request, res: Response): void => {
    res.json(poolManager.listAgents());
  });

  return router;
}
