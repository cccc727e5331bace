import { AgentPool, RandomSource } from './agent-pool.js';
import { parseAgentConfig } from './config-loader.js';
import { ConfigSource } from './config-source.js';
import { Agent, AgentListResponse } from '../types/index.js';
import { logger } from '../utils/logger.js';

export interface PoolManagerStatus {
  isInitialized: boolean;
  source: string;
  version: number;
  loadedAt: string;
  agents: number;
  lastRefreshError?: string;
}

/**
 * Owns the current AgentPool. Readers grab the reference once per call;
 * refresh builds a complete new pool before publishing it with a single assignment.
 */
export class PoolManager {
  private readonly source: ConfigSource;
  private readonly random: RandomSource;
  private pool: AgentPool = AgentPool.empty();
  private isInitialized: boolean = false;
  private lastRefreshError?: string;

  private runningRefresh: Promise<AgentPool> | null = null;
  private queuedRefresh: Promise<AgentPool> | null = null;

  constructor(source: ConfigSource, random: RandomSource = Math.random) {
    this.source = source;
    this.random = random;
  }

  async initialize(): Promise<boolean> {
    try {
      logger.info(`Loading agent configuration from ${this.source.description}...`);
      await this.refresh();
      this.isInitialized = true;
      return true;
    } catch (error) {
      logger.error('Error initializing Pool Manager:', error);
      return false;
    }
  }

  /**
   * Reload configuration and swap in the new pool.
   * On failure the running pool is kept and the error is rethrown.
   * A call made while a reload is running waits for it and then reloads again,
   * so the result always reflects a read that began after the call.
   * Calls made in the meantime share that second reload.
   */
  refresh(): Promise<AgentPool> {
    if (this.queuedRefresh) {
      return this.queuedRefresh;
    }

    const running = this.runningRefresh;
    if (!running) {
      return this.startRefresh();
    }

    const settled = (): void => undefined;
    const queued = running.then(settled, settled).then(() => {
      this.queuedRefresh = null;
      return this.startRefresh();
    });
    this.queuedRefresh = queued;
    return queued;
  }

  private startRefresh(): Promise<AgentPool> {
    const task = this.loadPool();
    this.runningRefresh = task;

    const clear = (): void => {
      if (this.runningRefresh === task) {
        this.runningRefresh = null;
      }
    };
    void task.then(clear, clear);

    return task;
  }

  private async loadPool(): Promise<AgentPool> {
    try {
      const document = await this.source.read();
      const next = new AgentPool(parseAgentConfig(document), this.pool.version + 1);

      this.pool = next;
      this.lastRefreshError = undefined;
      logger.info(
        `✅ Agent pool v${next.version} loaded: ${next.agents.length} agents across ${next.models.length} models`
      );
      return next;
    } catch (error) {
      this.lastRefreshError = error instanceof Error ? error.message : String(error);
      logger.warn(`⚠️  Agent pool refresh failed, keeping v${this.pool.version}: ${this.lastRefreshError}`);
      throw error;
    }
  }

  getPool(): AgentPool {
    return this.pool;
  }

  selectAgent(model?: string): Agent | null {
    return this.pool.select(model, this.random);
  }

  getAgent(name: string): Agent | null {
    return this.pool.getAgent(name);
  }

  listAgents(): AgentListResponse {
    const agents = this.pool.summarize();
    return { total: agents.length, agents };
  }

  /**
   * Persist a weight change to the configuration source. The running pool is
   * untouched until the next refresh.
   */
  async updateAgentWeight(name: string, weight: number): Promise<void> {
    await this.source.updateAgentWeight(name, weight);
    logger.info(`Weight of agent ${name} set to ${weight} in ${this.source.description} (pending refresh)`);
  }

  getStatus(): PoolManagerStatus {
    const pool = this.pool;
    return {
      isInitialized: this.isInitialized,
      source: this.source.description,
      version: pool.version,
      loadedAt: pool.loadedAt,
      agents: pool.agents.length,
      ...(this.lastRefreshError !== undefined && { lastRefreshError: this.lastRefreshError }),
    };
  }
}
