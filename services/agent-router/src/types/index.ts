import { Request, Response, NextFunction } from 'express';

// Core Types
export interface Agent {
  name: string;
  model: string;
  weight: number;
  enabled: boolean;
  externalId: string;
}

export interface ModelDefinition {
  name: string;
  enabled: boolean;
  capacity?: number;
}

export interface AgentDefaults {
  weight: number;
  enabled: boolean;
}

export interface PoolSnapshot {
  version: number;
  loadedAt: string;
  agents: readonly Agent[];
  models: readonly ModelDefinition[];
}

// Health Types
export type ModelStatus = 'active' | 'inactive';
export type PoolStatus = 'ok' | 'partial' | 'inactive';

export interface ModelGroupHealth {
  status: ModelStatus;
  agents: number;
  active_agents: number;
  total_weight: number;
}

export interface PoolHealth {
  status: PoolStatus;
  agents_loaded: number;
  active_models: number;
  total_models: number;
  models: Record<string, ModelGroupHealth>;
}

// API Types
export interface AgentSummary {
  name: string;
  model: string;
  weight: number;
  enabled: boolean;
}

export interface AgentListResponse {
  total: number;
  agents: AgentSummary[];
}

export interface Citation {
  id: number;
  type: 'url' | 'file';
  url?: string;
  title?: string;
  quote?: string;
}

export interface AgentAnswer {
  content: string;
  citations: Citation[];
}

export interface ResponseMetadata {
  agent_route: string;
  model: string;
  agent_id: string;
  region: string;
}

export interface GroundingResponse extends AgentAnswer {
  metadata: ResponseMetadata;
}

// Express Types
export type ExpressMiddleware = (req: Request, res: Response, next: NextFunction) => void;
