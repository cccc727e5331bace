import dotenv from 'dotenv';
import { createApp } from './src/app.js';
import { AgentBackend, FoundryAgentBackend, UnconfiguredBackend } from './src/clients/foundry-agent-client.js';
import { loadServiceConfig } from './src/config/index.js';
import { ErrorHandler } from './src/monitoring/error-handler.js';
import { GracefulShutdown } from './src/monitoring/graceful-shutdown.js';
import { HealthMonitor } from './src/monitoring/health-monitor.js';
import { FileConfigSource } from './src/services/config-source.js';
import { AgentDispatcher } from './src/services/dispatcher.js';
import { PoolManager } from './src/services/pool-manager.js';
import { logger, setLogLevel } from './src/utils/logger.js';

dotenv.config();

const config = loadServiceConfig();
setLogLevel(config.logLevel);

// Initialize core services
const poolManager = new PoolManager(new FileConfigSource(config.agentConfigPath));
const healthMonitor = new HealthMonitor(config.region);
const errorHandler = new ErrorHandler({ exposeStack: config.nodeEnv === 'development' });
const gracefulShutdown = new GracefulShutdown({ timeout: config.shutdownTimeoutMs });

let backend: AgentBackend;
if (config.projectEndpoint) {
  backend = new FoundryAgentBackend(config.projectEndpoint);
} else {
  logger.warn('⚠️  Warning: AZURE_AI_PROJECT_ENDPOINT not set; grounding requests will fail upstream');
  backend = new UnconfiguredBackend();
}

const dispatcher = new AgentDispatcher(poolManager, backend, {
  region: config.region,
  timeoutMs: config.upstreamTimeoutMs,
});

const app = createApp({
  poolManager,
  dispatcher,
  healthMonitor,
  errorHandler,
  adminApiKey: config.adminApiKey,
  urlPrefix: config.urlPrefix,
});

async function startService(): Promise<void> {
  logger.info('🚀 Starting Agent Pool Router...');
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Region: ${config.region}`);
  logger.info(`Agent configuration: ${config.agentConfigPath}`);

  const loaded = await poolManager.initialize();
  if (!loaded) {
    throw new Error('Failed to load agent configuration');
  }

  const health = healthMonitor.getPoolHealth(poolManager.getPool());
  logger.info(`💚 Initial pool status: ${health.status} (${health.active_models}/${health.total_models} models active)`);

  gracefulShutdown.registerSignalHandlers();

  const server = app.listen(config.port, () => {
    logger.info(`🌐 Agent Pool Router listening on port ${config.port}`);
    logger.info(`🔍 Health check available at: http://localhost:${config.port}${config.urlPrefix}/health`);
  });

  gracefulShutdown.addCleanupTask(async () => {
    logger.info('🛑 Closing HTTP server...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('✅ HTTP server closed');
  });

  gracefulShutdown.addCleanupTask(async () => {
    const cleared = errorHandler.clearErrors();
    logger.info(`Cleared ${cleared} error records`);
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error('💥 Unhandled Rejection:', reason);
  void gracefulShutdown.shutdown('unhandledRejection', reason);
});

startService().catch((error: unknown) => {
  logger.error('💥 Failed to start service:', error);
  process.exit(1);
});
