import { ResponseMetadata } from '../types/index.js';

export type RouterErrorCode =
  | 'configuration_error'
  | 'no_route_available'
  | 'processing_error'
  | 'agent_not_found'
  | 'validation_error'
  | 'unauthorized';

/**
 * Base class for errors the router knows how to render.
 * Anything else reaching the error middleware is treated as an internal error.
 */
export class RouterError extends Error {
  readonly code: RouterErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: RouterErrorCode, statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * Malformed agent configuration. A failed refresh keeps the previous pool.
 */
export class ConfigurationError extends RouterError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('configuration_error', 422, `Invalid agent configuration: ${issues.join('; ')}`, { issues });
    this.issues = issues;
  }
}

/**
 * The requested model has no agent with positive weight on this instance.
 * Answered with 503 so the gateway fails over to another region.
 */
export class NoRouteAvailableError extends RouterError {
  readonly model?: string;

  constructor(model?: string) {
    super(
      'no_route_available',
      503,
      model ? `No active agent available for model '${model}'` : 'No active agent available for any model',
      { model: model ?? null }
    );
    this.model = model;
  }
}

export class UpstreamFailureError extends RouterError {
  readonly metadata: ResponseMetadata;

  constructor(message: string, metadata: ResponseMetadata, options?: { cause?: unknown }) {
    super('processing_error', 502, message);
    this.metadata = metadata;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class AgentNotFoundError extends RouterError {
  constructor(name: string, available: string[] = []) {
    super('agent_not_found', 404, `Agent '${name}' not found`, { agent: name, available });
  }
}

export class ValidationError extends RouterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('validation_error', 400, message, details);
  }
}

export class UnauthorizedError extends RouterError {
  constructor() {
    super('unauthorized', 401, 'Missing or invalid admin key');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
