/**
 * Agent Task Orchestrator Service Entry Point
 */

import { loadConfig } from './config';
import { OrchestratorService } from './orchestrator';
import { StructuredLogger, errorFields } from './metrics/logger';
import { OrchestratorMetrics } from './metrics/prometheus';
import { createApiServer, startApiServer } from './api';

// Re-export public types and classes
export * from './interfaces/types';
export type { DiscoveryProvider } from './interfaces/discovery';
export type { StateStore } from './interfaces/state-store';
export { OrchestratorService } from './orchestrator';
export type { OrchestratorServiceOptions } from './orchestrator';
export { WorkerRegistry } from './registry/worker-registry';
export { normalizeContext, contextsMatch, contextName, summarizeByContext } from './registry/context';
export { AssignmentEngine } from './engine/assignment-engine';
export { ReconciliationLoop } from './loop/reconciliation-loop';
export type { CycleResult, LoopState, ReconciliationLoopConfig } from './loop/reconciliation-loop';
export { DiscoveryReconciler, classify } from './discovery/discovery-reconciler';
export type { ReconcileResult, SkippedDescriptor } from './discovery/discovery-reconciler';
export { RedisDiscoveryProvider } from './discovery/redis-discovery-provider';
export { RedisStateStore } from './persistence/redis-state-store';
export { InMemoryStateStore } from './persistence/in-memory-state-store';
export { loadConfig } from './config';
export type { EnvConfig } from './config';
export * from './metrics';

/**
 * Create and start the orchestrator and its API from environment variables
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new StructuredLogger({ minLevel: config.logLevel });
  const metrics = new OrchestratorMetrics();

  const service = new OrchestratorService(config.orchestrator, { logger, metrics });

  if (config.api.apiKeys.length === 0) {
    logger.warn('api_keys_missing', {
      message: 'API_KEYS is empty; every authenticated request will be rejected',
    });
  }

  await service.start();

  const app = createApiServer(
    service,
    { port: config.api.port, apiKeys: config.api.apiKeys },
    logger,
    metrics
  );
  const server = startApiServer(app, config.api.port, logger);

  // Handle graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('shutdown_requested', { signal });
    server.close();
    await service.stop();
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('shutdown_failed', errorFields(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandled_rejection', errorFields(reason));
    onSignal('unhandledRejection');
  });
}

// Run if executed directly
if (require.main === module) {
  main().catch((err: unknown) => {
    new StructuredLogger().error('fatal_error', errorFields(err));
    process.exit(1);
  });
}
