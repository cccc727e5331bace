import { Router, Request, Response, NextFunction } from 'express';
import { AgentDispatcher } from '../../services/dispatcher.js';
import { isRecord } from '../../utils/guards.js';
import { validateGroundingParams } from '../../utils/query-validation.js';

/**
 * Read a parameter from the query string, falling back to the JSON body
 */
function readParam(req: Request, key: 'query' | 'model'): unknown {
  const fromQuery = req.query[key];
  if (fromQuery !== undefined) {
    return fromQuery;
  }
  const body: unknown = req.body;
  return isRecord(body) ? body[key] : undefined;
}

/**
 * Create grounded query routes
 * @param dispatcher - Selects an agent and forwards the query upstream
 * @returns Express router with grounding endpoints
 */
export function createGroundingRoutes(dispatcher: AgentDispatcher): Router {
  const router = Router();

  /**
   * Weighted selection, optionally restricted to one model.
   * 503 when the model has no active agent on this instance.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { query, model } = validateGroundingParams(readParam(req, 'query'), readParam(req, 'model'));
      const result = await dispatcher.dispatch(query, model);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Address one agent directly by name, regardless of its weight
   */
  router.post('/:agentRoute', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { query } = validateGroundingParams(readParam(req, 'query'), undefined);
      const result = await dispatcher.dispatchTo(req.params['agentRoute'] ?? '', query);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
