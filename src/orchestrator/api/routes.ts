/**
 * API Routes - Express route definitions for orchestrator endpoints
 */

import { Router } from 'express';
import { OrchestratorHandlers } from './handlers';
import { StructuredLogger } from '../metrics/logger';
import {
  apiKeyAuth,
  createRateLimiter,
  correlationId,
  createRequestLogger,
} from './middleware';

/**
 * API configuration options
 */
export interface ApiRoutesConfig {
  apiKeys: string[];
  enableRateLimiting?: boolean;
  enableLogging?: boolean;
}

/**
 * Creates and configures the orchestrator API router
 *
 * @param handlers - The OrchestratorHandlers instance
 * @param config - API configuration options
 * @param logger - Logger for request lines
 * @returns Configured Express router
 */
export function createOrchestratorRoutes(
  handlers: OrchestratorHandlers,
  config: ApiRoutesConfig,
  logger: StructuredLogger
): Router {
  const router = Router();

  const validApiKeys = new Set(config.apiKeys);

  router.use(correlationId);

  if (config.enableLogging !== false) {
    router.use(createRequestLogger(logger));
  }

  if (config.enableRateLimiting !== false) {
    router.use(createRateLimiter());
  }

  router.use(apiKeyAuth(validApiKeys));

  /**
   * GET /orchestrator/state
   * Returns all workers, tasks and repository summaries
   */
  router.get('/state', handlers.getState);

  router.get('/workers', handlers.getWorkers);
  router.post('/workers', handlers.registerWorker);
  router.delete('/workers', handlers.clearWorkers);

  /**
   * POST /orchestrator/workers/:workerId/status
   * Workers report idle, busy, error or offline
   */
  router.post('/workers/:workerId/status', handlers.updateWorkerStatus);

  /**
   * GET /orchestrator/workers/:workerId/next-task
   * Workers poll for the task assigned to them
   */
  router.get('/workers/:workerId/next-task', handlers.getNextTask);

  /**
   * POST /orchestrator/tasks/assign
   * Runs an assignment sweep now
   */
  router.post('/tasks/assign', handlers.triggerAssignment);

  router.post('/tasks', handlers.enqueueTask);
  router.post('/tasks/:taskId/status', handlers.updateTaskStatus);

  router.get('/repositories', handlers.getRepositories);

  /**
   * POST /orchestrator/refresh
   * Runs worker discovery now
   */
  router.post('/refresh', (req, res, next) => {
    handlers.refresh(req, res).catch(next);
  });

  return router;
}

/**
 * Get the base path for orchestrator routes
 */
export const ORCHESTRATOR_BASE_PATH = '/orchestrator';
