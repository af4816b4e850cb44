/**
 * Orchestrator API Module
 *
 * REST endpoints for task submission, worker reporting and orchestrator state.
 */

import express, { Application, json } from 'express';
import { OrchestratorService } from '../orchestrator';
import { StructuredLogger } from '../metrics/logger';
import { OrchestratorMetrics } from '../metrics/prometheus';
import { OrchestratorHandlers } from './handlers';
import { createOrchestratorRoutes, ORCHESTRATOR_BASE_PATH, ApiRoutesConfig } from './routes';
import { createErrorHandler } from './middleware';

export { OrchestratorHandlers } from './handlers';
export type {
  StateResponse,
  WorkerListResponse,
  EnqueueRequest,
  EnqueueResponse,
  RefreshResponse,
} from './handlers';
export { createOrchestratorRoutes, ORCHESTRATOR_BASE_PATH } from './routes';
export type { ApiRoutesConfig } from './routes';
export {
  API_KEY_HEADER,
  apiKeyAuth,
  createRateLimiter,
  correlationId,
  createRequestLogger,
  createErrorHandler,
} from './middleware';

/**
 * API Server configuration
 */
export interface ApiServerConfig {
  port: number;
  apiKeys: string[];
  enableRateLimiting?: boolean;
  enableLogging?: boolean;
}

/**
 * Creates a standalone Express application with the orchestrator API
 *
 * @param service - The running OrchestratorService
 * @param apiConfig - API server configuration
 * @param logger - Logger for request and error lines
 * @param metrics - Served on /metrics when given
 */
export function createApiServer(
  service: OrchestratorService,
  apiConfig: ApiServerConfig,
  logger: StructuredLogger = new StructuredLogger(),
  metrics?: OrchestratorMetrics
): Application {
  const app = express();

  app.use(json());

  const handlers = new OrchestratorHandlers(service);

  const routesConfig: ApiRoutesConfig = {
    apiKeys: apiConfig.apiKeys,
    enableRateLimiting: apiConfig.enableRateLimiting,
    enableLogging: apiConfig.enableLogging,
  };

  app.use(ORCHESTRATOR_BASE_PATH, createOrchestratorRoutes(handlers, routesConfig, logger));

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({
      status: service.isRunning() ? 'ok' : 'stopped',
      loop: service.getLoop().getState(),
      timestamp: new Date().toISOString(),
    });
  });

  if (metrics) {
    app.get('/metrics', (_req, res, next) => {
      metrics
        .getMetrics()
        .then((body) => {
          res.set('Content-Type', metrics.getContentType());
          res.send(body);
        })
        .catch(next);
    });
  }

  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Starts the API server
 *
 * @param app - The Express application
 * @param port - Port to listen on
 * @returns HTTP server instance
 */
export function startApiServer(
  app: Application,
  port: number,
  logger: StructuredLogger = new StructuredLogger()
): ReturnType<Application['listen']> {
  return app.listen(port, () => {
    logger.info('api_listening', {
      port,
      basePath: ORCHESTRATOR_BASE_PATH,
    });
  });
}
