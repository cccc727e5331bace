import { ErrorRequestHandler, Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import {
  NoRouteAvailableError,
  RouterError,
  UpstreamFailureError,
  ValidationError,
} from './errors.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code: string;
  message: string;
  stack?: string;
  context: {
    url?: string;
    method?: string;
    agent?: string;
    model?: string;
  };
  severity: 'low' | 'medium' | 'high' | 'critical';
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
}

export class ErrorHandler {
  private errors: ErrorInfo[] = [];
  private readonly maxErrors: number;
  private readonly exposeStack: boolean;

  constructor(options: { maxErrors?: number; exposeStack?: boolean } = {}) {
    this.maxErrors = options.maxErrors ?? 200;
    this.exposeStack = options.exposeStack ?? false;
  }

  /**
   * Express error handling middleware
   */
  middleware(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const normalized = this.normalizeError(error);

      // load shedding, not a fault: answered but not recorded
      if (normalized instanceof NoRouteAvailableError) {
        logger.debug(`No route: ${normalized.message}`);
        res.status(normalized.statusCode).json({
          error: normalized.code,
          message: normalized.message,
          model: normalized.model ?? null,
          timestamp: new Date().toISOString(),
        });
        return;
      }

      const errorInfo = this.captureError(normalized, {
        url: req.originalUrl,
        method: req.method,
      });

      this.sendErrorResponse(normalized, errorInfo, res);
    };
  }

  /**
   * body-parser reports malformed JSON as an error carrying `type`
   */
  private normalizeError(error: unknown): unknown {
    if (isRecord(error) && error['type'] === 'entity.parse.failed') {
      return new ValidationError('Request body is not valid JSON');
    }
    return error;
  }

  /**
   * Record and log an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const err = error instanceof Error ? error : new Error(String(error));
    const severity = this.determineSeverity(err);

    if (err instanceof UpstreamFailureError) {
      context = { ...context, agent: err.metadata.agent_route, model: err.metadata.model };
    }

    const errorInfo: ErrorInfo = {
      id: `err_${uuidv4()}`,
      timestamp: new Date().toISOString(),
      type: err.name,
      code: err instanceof RouterError ? err.code : 'internal_error',
      message: err.message,
      stack: err.stack,
      context,
      severity,
    };

    this.errors.push(errorInfo);
    if (this.errors.length > this.maxErrors) {
      this.errors.splice(0, this.errors.length - this.maxErrors);
    }
    this.logError(errorInfo);

    return errorInfo;
  }

  /**
   * Severity drives the log level
   */
  private determineSeverity(error: Error): ErrorInfo['severity'] {
    if (error instanceof UpstreamFailureError) {
      return 'high';
    }
    if (error instanceof RouterError) {
      return error.statusCode >= 500 ? 'high' : error.code === 'configuration_error' ? 'medium' : 'low';
    }
    return 'critical';
  }

  private sendErrorResponse(error: unknown, errorInfo: ErrorInfo, res: Response): void {
    const timestamp = errorInfo.timestamp;

    if (error instanceof UpstreamFailureError) {
      res.status(error.statusCode).json({
        error: error.code,
        message: error.message,
        metadata: error.metadata,
        errorId: errorInfo.id,
        timestamp,
      });
      return;
    }

    if (error instanceof RouterError) {
      res.status(error.statusCode).json({
        error: error.code,
        message: error.message,
        ...(error.details && { details: error.details }),
        timestamp,
      });
      return;
    }

    res.status(500).json({
      error: 'internal_error',
      message: 'An unexpected error occurred.',
      errorId: errorInfo.id,
      timestamp,
      ...(this.exposeStack && { stack: errorInfo.stack }),
    });
  }

  private logError(errorInfo: ErrorInfo): void {
    const line = `Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`;
    const details = { severity: errorInfo.severity, context: errorInfo.context };

    switch (errorInfo.severity) {
      case 'low':
      case 'medium':
        logger.warn(line, details);
        break;
      default:
        logger.error(line, details);
    }
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.length,
      bySeverity: {},
      byType: {},
    };

    for (const error of this.errors) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] || 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] || 0) + 1;
    }

    return stats;
  }

  getRecentErrors(limit: number = 10): ErrorInfo[] {
    return this.errors.slice(-limit);
  }

  clearErrors(): number {
    const cleared = this.errors.length;
    this.errors = [];
    return cleared;
  }
}
