import { describe, it, expect } from 'vitest';
import { HealthMonitor } from './health-monitor.js';
import { AgentPool } from '../services/agent-pool.js';
import { parseAgentConfig } from '../services/config-loader.js';

function poolFrom(yaml: string): AgentPool {
  return new AgentPool(parseAgentConfig(yaml), 3, '2026-01-01T00:00:00.000Z');
}

describe('HealthMonitor', () => {
  const monitor = new HealthMonitor('test-region');

  it('should report a model whose agents all have weight 0 as inactive', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
agents:
  - { name: a1, model: gpt-4o, weight: 0 }
  - { name: a2, model: gpt-4o, weight: 0 }
`);

    expect(monitor.getPoolHealth(pool)).toEqual({
      status: 'inactive',
      agents_loaded: 2,
      active_models: 0,
      total_models: 1,
      models: {
        'gpt-4o': { status: 'inactive', agents: 2, active_agents: 0, total_weight: 0 },
      },
    });
  });

  it('should report partial when only some models are active', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
  gpt-4.1-mini: {}
agents:
  - { name: a1, model: gpt-4o, weight: 90 }
  - { name: a2, model: gpt-4o, weight: 10 }
  - { name: m1, model: gpt-4.1-mini, weight: 0 }
`);

    const health = monitor.getPoolHealth(pool);

    expect(health.status).toBe('partial');
    expect(health.active_models).toBe(1);
    expect(health.total_models).toBe(2);
    expect(health.models['gpt-4o']).toEqual({ status: 'active', agents: 2, active_agents: 2, total_weight: 100 });
    expect(health.models['gpt-4.1-mini']).toEqual({ status: 'inactive', agents: 1, active_agents: 0, total_weight: 0 });
  });

  it('should report ok when every model is active', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
  gpt-4.1-mini: {}
agents:
  - { name: a1, model: gpt-4o, weight: 1 }
  - { name: m1, model: gpt-4.1-mini, weight: 1 }
`);

    expect(monitor.getPoolHealth(pool).status).toBe('ok');
  });

  it('should count disabled agents but leave them out of weight and activity', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
agents:
  - { name: a1, model: gpt-4o, weight: 90 }
  - { name: a2, model: gpt-4o, weight: 50, enabled: false }
`);

    const health = monitor.getPoolHealth(pool);

    expect(health.agents_loaded).toBe(1);
    expect(health.models['gpt-4o']).toEqual({ status: 'active', agents: 2, active_agents: 1, total_weight: 90 });
  });

  it('should report a defined model with no agents as inactive', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
  gpt-4: {}
agents:
  - { name: a1, model: gpt-4o, weight: 5 }
`);

    const health = monitor.getPoolHealth(pool);

    expect(health.status).toBe('partial');
    expect(health.models['gpt-4']).toEqual({ status: 'inactive', agents: 0, active_agents: 0, total_weight: 0 });
  });

  it('should report an empty pool as inactive', () => {
    expect(monitor.getPoolHealth(AgentPool.empty())).toEqual({
      status: 'inactive',
      agents_loaded: 0,
      active_models: 0,
      total_models: 0,
      models: {},
    });
  });

  it('should return identical output on repeated calls', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
agents:
  - { name: a1, model: gpt-4o, weight: 3 }
`);

    expect(monitor.getHealthReport(pool)).toEqual(monitor.getHealthReport(pool));
  });

  it('should add region and pool version to the report', () => {
    const pool = poolFrom(`
models:
  gpt-4o: {}
agents:
  - { name: a1, model: gpt-4o, weight: 3 }
`);

    expect(monitor.getHealthReport(pool)).toMatchObject({
      status: 'ok',
      region: 'test-region',
      config_version: 3,
      loaded_at: '2026-01-01T00:00:00.000Z',
    });
  });
});
