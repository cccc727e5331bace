import { Agent, AgentSummary, ModelDefinition, PoolSnapshot } from '../types/index.js';
import { ParsedAgentConfig } from './config-loader.js';

export type RandomSource = () => number;

export interface ModelGroup {
  model: string;
  /** Every agent configured for the model, disabled ones included */
  members: readonly Agent[];
  /** Enabled members, in load order */
  routable: readonly Agent[];
  totalWeight: number;
  activeCount: number;
}

/**
 * Immutable view of one configuration load.
 *
 * A pool is built once and never changed; a refresh builds a new pool and
 * swaps the reference held by the PoolManager.
 */
export class AgentPool implements PoolSnapshot {
  readonly version: number;
  readonly loadedAt: string;
  readonly agents: readonly Agent[];
  readonly models: readonly ModelDefinition[];
  private readonly byName: ReadonlyMap<string, Agent>;

  constructor(config: ParsedAgentConfig, version: number, loadedAt: string = new Date().toISOString()) {
    this.version = version;
    this.loadedAt = loadedAt;
    this.agents = Object.freeze(config.agents.map((agent) => Object.freeze({ ...agent })));
    this.models = Object.freeze(config.models.map((model) => Object.freeze({ ...model })));
    this.byName = new Map(this.agents.map((agent) => [agent.name, agent]));
  }

  static empty(): AgentPool {
    return new AgentPool({ models: [], agents: [] }, 0);
  }

  getAgent(name: string): Agent | null {
    return this.byName.get(name) ?? null;
  }

  /**
   * Enabled agents eligible for a request, optionally restricted to one model (exact match).
   */
  candidates(model?: string): Agent[] {
    return this.agents.filter((agent) => agent.enabled && (model === undefined || agent.model === model));
  }

  /**
   * Weighted random choice among the candidates for `model`.
   * Returns null when their weights sum to zero; callers turn that into a no-route answer.
   */
  select(model?: string, random: RandomSource = Math.random): Agent | null {
    const candidates = this.candidates(model);
    const totalWeight = candidates.reduce((sum, agent) => sum + agent.weight, 0);
    if (totalWeight <= 0) {
      return null;
    }

    // uniform integer in [0, totalWeight)
    const draw = Math.min(Math.floor(random() * totalWeight), totalWeight - 1);

    let cumulative = 0;
    for (const agent of candidates) {
      cumulative += agent.weight;
      if (cumulative > draw) {
        return agent;
      }
    }

    return null;
  }

  /**
   * Model groups in the order the models are defined.
   */
  getModelGroups(): ModelGroup[] {
    return this.models.map((definition) => {
      const members = this.agents.filter((agent) => agent.model === definition.name);
      const routable = members.filter((agent) => agent.enabled);
      return {
        model: definition.name,
        members,
        routable,
        totalWeight: routable.reduce((sum, agent) => sum + agent.weight, 0),
        activeCount: routable.filter((agent) => agent.weight > 0).length,
      };
    });
  }

  summarize(): AgentSummary[] {
    return this.agents.map(({ name, model, weight, enabled }) => ({ name, model, weight, enabled }));
  }

  get enabledCount(): number {
    return this.agents.filter((agent) => agent.enabled).length;
  }
}
