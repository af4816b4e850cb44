/**
 * API Middleware - Authentication, rate limiting, correlation and logging
 */

import { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { StructuredLogger } from '../metrics/logger';

/**
 * Extend Express Request to include correlation ID
 */
declare global {
  namespace Express {
    interface Request {
      correlationId: string;
    }
  }
}

export const API_KEY_HEADER = 'X-Orchestrator-Key';

/**
 * API key authentication middleware
 * Validates the X-Orchestrator-Key header against configured API keys
 */
export function apiKeyAuth(validKeys: Set<string>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const apiKey = req.header(API_KEY_HEADER);

    if (!apiKey) {
      res.status(401).json({
        error: 'Unauthorized',
        message: `Missing ${API_KEY_HEADER} header`,
        correlationId: req.correlationId,
      });
      return;
    }

    if (!validKeys.has(apiKey)) {
      res.status(403).json({
        error: 'Forbidden',
        message: 'Invalid API key',
        correlationId: req.correlationId,
      });
      return;
    }

    next();
  };
}

/**
 * Rate limiting middleware
 * Limits to 300 requests per minute per API key; workers poll for tasks
 */
export function createRateLimiter() {
  return rateLimit({
    windowMs: 60 * 1000,
    limit: 300,
    keyGenerator: (req: Request): string => {
      return req.header(API_KEY_HEADER) || req.ip || 'unknown';
    },
    message: {
      error: 'Too Many Requests',
      message: 'Rate limit exceeded. Max 300 requests per minute.',
      retryAfter: 60,
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Correlation ID middleware
 * Adds a unique correlation ID to each request for tracing
 */
export function correlationId(req: Request, _res: Response, next: NextFunction): void {
  req.correlationId = req.header('X-Correlation-ID') || uuidv4();
  next();
}

/**
 * Request logging middleware
 * Logs request details with correlation ID once the response is sent
 */
export function createRequestLogger(logger: StructuredLogger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      logger.child(req.correlationId).info('http_request', {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  };
}

/**
 * Error handling middleware
 * Catches unhandled errors and returns consistent error response
 */
export function createErrorHandler(logger: StructuredLogger) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    logger.child(req.correlationId).error('http_request_failed', {
      method: req.method,
      path: req.path,
      error: err.name,
      message: err.message,
      stack: err.stack,
    });

    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      correlationId: req.correlationId,
    });
  };
}
