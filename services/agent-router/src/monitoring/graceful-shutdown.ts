import { logger } from '../utils/logger.js';

export interface ShutdownOptions {
  timeout: number; // milliseconds
  forceExit: boolean;
  exit: (code: number) => void;
}

export type CleanupTask = () => Promise<void>;

export class GracefulShutdown {
  private isShuttingDown: boolean = false;
  private shutdownTimeout: NodeJS.Timeout | null = null;
  private readonly options: ShutdownOptions;
  private readonly cleanupTasks: CleanupTask[] = [];

  constructor(options: Partial<ShutdownOptions> = {}) {
    this.options = {
      timeout: 30000,
      forceExit: true,
      exit: (code) => process.exit(code),
      ...options,
    };
  }

  /**
   * Handle SIGTERM (App Service, containers) and SIGINT (Ctrl+C)
   */
  registerSignalHandlers(): void {
    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      process.on(signal, () => {
        logger.info(`Received ${signal} signal`);
        void this.shutdown(signal);
      });
    }
  }

  /**
   * Tasks run in registration order during shutdown
   */
  addCleanupTask(task: CleanupTask): void {
    this.cleanupTasks.push(task);
  }

  async shutdown(signal: string, error?: unknown): Promise<void> {
    if (this.isShuttingDown) {
      logger.info(`Shutdown already in progress, ignoring signal: ${signal}`);
      return;
    }

    this.isShuttingDown = true;
    logger.info(`Initiating graceful shutdown due to: ${signal}`);

    this.shutdownTimeout = setTimeout(() => {
      logger.error('Shutdown timeout reached, forcing exit');
      if (this.options.forceExit) {
        this.options.exit(1);
      }
    }, this.options.timeout);

    const failures = await this.executeCleanupTasks();

    if (this.shutdownTimeout) {
      clearTimeout(this.shutdownTimeout);
      this.shutdownTimeout = null;
    }

    logger.info(failures === 0 ? 'Graceful shutdown completed successfully' : `Shutdown completed with ${failures} failed cleanup task(s)`);
    this.options.exit(error !== undefined || failures > 0 ? 1 : 0);
  }

  isShuttingDownInProgress(): boolean {
    return this.isShuttingDown;
  }

  private async executeCleanupTasks(): Promise<number> {
    const tasks = this.cleanupTasks;
    let failures = 0;

    for (const [i, task] of tasks.entries()) {
      try {
        logger.info(`Executing cleanup task ${i + 1}/${tasks.length}`);
        await task();
      } catch (error) {
        failures++;
        // remaining tasks still run
        logger.error(`Cleanup task ${i + 1} failed:`, error);
      }
    }

    return failures;
  }
}
