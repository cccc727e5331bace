import { AgentPool } from '../services/agent-pool.js';
import { ModelGroupHealth, PoolHealth, PoolStatus } from '../types/index.js';

export interface HealthReport extends PoolHealth {
  region: string;
  config_version: number;
  loaded_at: string;
}

export class HealthMonitor {
  private readonly region: string;
  private readonly startTime: number;

  constructor(region: string) {
    this.region = region;
    this.startTime = Date.now();
  }

  /**
   * Aggregate per-model and pool-wide status. Reads the pool only.
   */
  getPoolHealth(pool: AgentPool): PoolHealth {
    const models: Record<string, ModelGroupHealth> = {};
    let activeModels = 0;

    for (const group of pool.getModelGroups()) {
      const active = group.activeCount > 0;
      if (active) activeModels++;

      models[group.model] = {
        status: active ? 'active' : 'inactive',
        agents: group.members.length,
        active_agents: group.activeCount,
        total_weight: group.totalWeight,
      };
    }

    const totalModels = Object.keys(models).length;

    return {
      status: this.determinePoolStatus(activeModels, totalModels),
      agents_loaded: pool.enabledCount,
      active_models: activeModels,
      total_models: totalModels,
      models,
    };
  }

  getHealthReport(pool: AgentPool): HealthReport {
    return {
      ...this.getPoolHealth(pool),
      region: this.region,
      config_version: pool.version,
      loaded_at: pool.loadedAt,
    };
  }

  getUptime(): number {
    return Date.now() - this.startTime;
  }

  private determinePoolStatus(activeModels: number, totalModels: number): PoolStatus {
    if (totalModels > 0 && activeModels === totalModels) {
      return 'ok';
    }
    if (activeModels > 0) {
      return 'partial';
    }
    return 'inactive';
  }
}
