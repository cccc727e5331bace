import { Application } from 'express';
import { createHealthRoutes } from './health.js';
import { createAgentRoutes } from './agents.js';
import { createGroundingRoutes } from './grounding.js';
import { createAdminRoutes } from './admin.js';
import { ErrorHandler } from '../../monitoring/error-handler.js';
import { HealthMonitor } from '../../monitoring/health-monitor.js';
import { AgentDispatcher } from '../../services/dispatcher.js';
import { PoolManager } from '../../services/pool-manager.js';
import { logger } from '../../utils/logger.js';

export interface RouteDependencies {
  poolManager: PoolManager;
  dispatcher: AgentDispatcher;
  healthMonitor: HealthMonitor;
  errorHandler: ErrorHandler;
  adminApiKey?: string;
}

/**
 * Setup all API routes for the agent router
 * @param app - Express application instance
 * @param urlPrefix - URL prefix for all routes ('' mounts them at the root)
 * @param deps - Services the routes delegate to
 */
export function setupRoutes(app: Application, urlPrefix: string, deps: RouteDependencies): void {
  logger.debug('Setting up agent router API routes...');

  const { poolManager, dispatcher, healthMonitor, errorHandler, adminApiKey } = deps;
  const endpoints = {
    health: `${urlPrefix}/health`,
    agents: `${urlPrefix}/agents`,
    grounding: `${urlPrefix}/bing-grounding`,
    admin: `${urlPrefix}/admin`,
    errors: `${urlPrefix}/errors`,
  };

  app.use(endpoints.health, createHealthRoutes(poolManager, healthMonitor));
  app.use(endpoints.agents, createAgentRoutes(poolManager));
  app.use(endpoints.grounding, createGroundingRoutes(dispatcher));
  app.use(endpoints.admin, createAdminRoutes(poolManager, adminApiKey));

  // Error statistics endpoint
  app.get(endpoints.errors, (req, res) => {
    res.json({
      stats: errorHandler.getErrorStats(),
      recent: errorHandler.getRecentErrors(10).map(({ stack, ...rest }) => rest),
    });
  });

  // Root endpoint
  app.get(urlPrefix || '/', (req, res) => {
    res.json({
      service: 'Agent Pool Router',
      version: '1.0.0',
      status: 'running',
      description: 'Weighted agent selection with per-model health for gateway failover',
      endpoints,
      timestamp: new Date().toISOString(),
    });
  });

  // 404 handler for undefined routes
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableEndpoints: Object.values(endpoints),
      timestamp: new Date().toISOString(),
    });
  });

  // Error handling middleware (must be last)
  app.use(errorHandler.middleware());
}
