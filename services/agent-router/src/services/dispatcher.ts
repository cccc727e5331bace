import { AgentBackend } from '../clients/foundry-agent-client.js';
import {
  AgentNotFoundError,
  NoRouteAvailableError,
  UpstreamFailureError,
  errorMessage,
} from '../monitoring/errors.js';
import { Agent, GroundingResponse, ResponseMetadata } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { PoolManager } from './pool-manager.js';

export interface DispatcherOptions {
  region: string;
  timeoutMs: number;
}

/**
 * Turns a selection into an upstream call.
 *
 * A failed selection is answered with NoRouteAvailableError and nothing else;
 * failing over to another model or region is the gateway's job.
 */
export class AgentDispatcher {
  private readonly poolManager: PoolManager;
  private readonly backend: AgentBackend;
  private readonly options: DispatcherOptions;

  constructor(poolManager: PoolManager, backend: AgentBackend, options: DispatcherOptions) {
    this.poolManager = poolManager;
    this.backend = backend;
    this.options = options;
  }

  async dispatch(query: string, model?: string): Promise<GroundingResponse> {
    const agent = this.poolManager.selectAgent(model);
    if (!agent) {
      logger.info(`No route for model ${model ?? '(any)'}; answering 503`);
      throw new NoRouteAvailableError(model);
    }

    return this.invoke(agent, query);
  }

  /**
   * Send the query to one agent by name, bypassing weights.
   */
  async dispatchTo(name: string, query: string): Promise<GroundingResponse> {
    const agent = this.poolManager.getAgent(name);
    if (!agent || !agent.enabled) {
      const available = this.poolManager
        .getPool()
        .candidates()
        .map((candidate) => candidate.name);
      throw new AgentNotFoundError(name, available);
    }

    return this.invoke(agent, query);
  }

  private async invoke(agent: Agent, query: string): Promise<GroundingResponse> {
    const metadata = this.buildMetadata(agent);
    logger.debug(`Routing query to ${agent.name} (${agent.model})`);

    try {
      const controller = new AbortController();
      const answer = await withTimeout(
        this.backend.answer(agent.externalId, query, { abortSignal: controller.signal }),
        this.options.timeoutMs,
        controller
      );
      return { ...answer, metadata };
    } catch (error) {
      logger.error(`❌ Agent ${agent.name} (${agent.model}, ${agent.externalId}) failed: ${errorMessage(error)}`);
      throw new UpstreamFailureError(errorMessage(error), metadata, { cause: error });
    }
  }

  private buildMetadata(agent: Agent): ResponseMetadata {
    return {
      agent_route: agent.name,
      model: agent.model,
      agent_id: agent.externalId,
      region: this.options.region,
    };
  }
}
