import { Router, Request, Response, NextFunction } from 'express';
import { MAX_AGENT_WEIGHT, formatIssues, weightUpdateSchema } from '../../config/schema.js';
import { requireAdminKey } from '../../middleware/admin-auth.js';
import { ValidationError } from '../../monitoring/errors.js';
import { PoolManager } from '../../services/pool-manager.js';

/**
 * Create admin routes
 * @param poolManager - Pool manager instance
 * @param adminApiKey - Shared key required in x-admin-key, if set
 * @returns Express router with admin endpoints
 */
export function createAdminRoutes(poolManager: PoolManager, adminApiKey?: string): Router {
  const router = Router();

  router.use(requireAdminKey(adminApiKey));

  /**
   * Change one agent's weight in the configuration source.
   * The running pool keeps its weights until the next refresh.
   */
  router.put('/agents/:name/weight', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const name = req.params['name'] ?? '';
      const parsed = weightUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(`weight must be an integer from 0 to ${MAX_AGENT_WEIGHT}`, { issues: formatIssues(parsed.error) });
      }

      await poolManager.updateAgentWeight(name, parsed.data.weight);

      res.json({
        name,
        weight: parsed.data.weight,
        applied: false,
        message: 'Weight saved to configuration; call POST /admin/refresh to apply it',
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Reload configuration and swap the pool
   */
  router.post('/refresh', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const pool = await poolManager.refresh();
      const agents = pool.summarize();

      res.json({
        total: agents.length,
        agents,
        config_version: pool.version,
        loaded_at: pool.loadedAt,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Pool manager status, including the last refresh failure if any
   */
  router.get('/status', (req: Request, res: Response): void => {
    res.json(poolManager.getStatus());
  });

  return router;
}
