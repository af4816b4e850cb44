/**
 * Orchestrator Service - Caller-facing facade over registry, engine, loop and discovery
 */

import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  OrchestratorConfig,
  OrchestratorSnapshot,
  RepositorySummary,
  Task,
  TaskPriority,
  TaskStatus,
  Worker,
  WorkerDescriptor,
  WorkerRegistration,
  WorkerStatus,
} from './interfaces/types';
import { DiscoveryProvider } from './interfaces/discovery';
import { StateStore } from './interfaces/state-store';
import { WorkerRegistry } from './registry/worker-registry';
import { summarizeByContext } from './registry/context';
import { AssignmentEngine } from './engine/assignment-engine';
import { ReconciliationLoop } from './loop/reconciliation-loop';
import { DiscoveryReconciler, ReconcileResult } from './discovery/discovery-reconciler';
import { RedisDiscoveryProvider } from './discovery/redis-discovery-provider';
import { RedisStateStore } from './persistence/redis-state-store';
import { InMemoryStateStore } from './persistence/in-memory-state-store';
import { SnapshotWriter } from './persistence/snapshot-writer';
import { StructuredLogger, errorFields } from './metrics/logger';
import { OrchestratorMetrics } from './metrics/prometheus';

/**
 * Collaborators that replace the defaults derived from the config
 */
export interface OrchestratorServiceOptions {
  stateStore?: StateStore;
  /** Pass null to disable discovery even when a Redis URL is configured */
  discoveryProvider?: DiscoveryProvider | null;
  logger?: StructuredLogger;
  metrics?: OrchestratorMetrics;
}

/**
 * OrchestratorService owns one registry, engine, reconciler and loop.
 *
 * Without a Redis URL it keeps snapshots in memory and relies on workers
 * registering themselves. Every mutation schedules a snapshot save.
 */
export class OrchestratorService {
  private config: OrchestratorConfig;
  private logger: StructuredLogger;
  private registry: WorkerRegistry;
  private engine: AssignmentEngine;
  private reconciler: DiscoveryReconciler;
  private loop: ReconciliationLoop;
  private stateStore: StateStore;
  private discovery: DiscoveryProvider | null;
  private writer: SnapshotWriter;
  private metrics: OrchestratorMetrics | null;
  private discoveryInterval: ReturnType<typeof setInterval> | null = null;
  private refreshing: Promise<ReconcileResult | null> | null = null;
  private running: boolean = false;

  constructor(config: Partial<OrchestratorConfig> = {}, options: OrchestratorServiceOptions = {}) {
    this.config = {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      ...config,
    };
    this.logger = options.logger ?? new StructuredLogger();

    this.registry = new WorkerRegistry();
    this.engine = new AssignmentEngine(this.registry, this.logger);
    this.reconciler = new DiscoveryReconciler(
      this.registry,
      this.config.activityWindowMs,
      this.logger
    );
    this.loop = this.createLoop();

    const redisUrl = this.config.redisUrl;
    this.stateStore =
      options.stateStore ??
      (redisUrl
        ? new RedisStateStore({ redisUrl, stateKey: this.config.stateKey }, this.logger)
        : new InMemoryStateStore());

    if (options.discoveryProvider !== undefined) {
      this.discovery = options.discoveryProvider;
    } else {
      this.discovery = redisUrl
        ? new RedisDiscoveryProvider(
            { redisUrl, discoveryKey: this.config.discoveryKey },
            this.logger
          )
        : null;
    }

    this.writer = new SnapshotWriter(this.stateStore, this.logger);
    this.engine.on('taskEvent', () => this.persist());

    this.metrics = options.metrics ?? null;
    if (this.metrics) {
      this.metrics.observe(this.engine, this.loop, this.registry);
    }
  }

  /**
   * Connect collaborators, restore the last snapshot and start the loop
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    this.logger.info('orchestrator_starting', {
      persistence: this.config.redisUrl ? 'redis' : 'memory',
      discovery: this.discovery ? 'enabled' : 'disabled',
    });

    try {
      await this.stateStore.connect?.();
      await this.discovery?.connect?.();

      await this.restore();
      await this.refreshWorkers();

      if (this.loop.getState() === 'stopped') {
        this.loop = this.createLoop();
        this.metrics?.observeLoop(this.loop, this.engine, this.registry);
      }
      if (!this.loop.start()) {
        throw new Error(`Reconciliation loop could not start from state ${this.loop.getState()}`);
      }
      this.startDiscoveryPolling();

      this.running = true;
      this.logger.info('orchestrator_started');
    } catch (err) {
      this.logger.error('orchestrator_start_failed', errorFields(err));
      await this.stop();
      throw err;
    }
  }

  /**
   * Stop the loop, flush pending snapshots and disconnect
   */
  async stop(): Promise<void> {
    this.logger.info('orchestrator_stopping');

    if (this.discoveryInterval) {
      clearInterval(this.discoveryInterval);
      this.discoveryInterval = null;
    }

    await this.loop.stop();
    if (this.refreshing) {
      await this.refreshing;
    }
    await this.writer.flush();

    try {
      await this.discovery?.disconnect?.();
      await this.stateStore.disconnect?.();
    } catch (err) {
      this.logger.error('orchestrator_disconnect_failed', errorFields(err));
    }

    this.running = false;
    this.logger.info('orchestrator_stopped');
  }

  /**
   * Queue a task; it is assigned at once when an idle worker exists
   */
  enqueue(command: string, resourceContext: string, priority: TaskPriority = 'normal'): string {
    return this.engine.enqueue(command, resourceContext, priority);
  }

  getSnapshot(): OrchestratorSnapshot {
    return this.engine.getSnapshot();
  }

  registerWorker(registration: WorkerRegistration): boolean {
    const registered = this.registry.register(registration);
    if (registered) {
      this.logger.info('worker_registered', {
        workerId: registration.id,
        resourceContext: registration.resourceContext,
        status: registration.status ?? 'idle',
      });
      this.persist();
    }
    return registered;
  }

  updateWorkerStatus(workerId: string, status: WorkerStatus, currentTaskRef?: string): boolean {
    const updated = this.registry.updateStatus(workerId, status, currentTaskRef);
    if (updated) {
      this.logger.debug('worker_status_updated', { workerId, status });
      this.persist();
    }
    return updated;
  }

  updateTaskStatus(taskId: string, status: TaskStatus, result?: string): boolean {
    return this.engine.updateTaskStatus(taskId, status, result);
  }

  /**
   * Run an assignment sweep now
   *
   * @returns Number of tasks assigned
   */
  triggerAssignment(): number {
    return this.engine.triggerAssignment();
  }

  clearWorkers(): void {
    this.registry.clearAll();
    this.logger.info('workers_cleared');
    this.persist();
  }

  getTask(taskId: string): Task | undefined {
    return this.engine.getTask(taskId);
  }

  getWorker(workerId: string): Worker | undefined {
    return this.registry.get(workerId);
  }

  getWorkers(): Worker[] {
    return this.registry.getAll();
  }

  getAvailableWorkers(resourceContext: string = ''): Worker[] {
    return this.registry.findAvailable(resourceContext);
  }

  getNextTaskForWorker(workerId: string): Task | undefined {
    return this.engine.getNextTaskForWorker(workerId);
  }

  getRepositories(): RepositorySummary[] {
    return summarizeByContext(this.registry.getAll());
  }

  /**
   * Discover workers and replace the registry with the result.
   * Discovery runs before any state is touched; a failing provider leaves
   * the registry as it was. Concurrent calls share one refresh.
   *
   * @returns The reconcile outcome, or null when discovery is disabled or failed
   */
  refreshWorkers(): Promise<ReconcileResult | null> {
    if (!this.discovery) {
      return Promise.resolve(null);
    }
    if (this.refreshing) {
      return this.refreshing;
    }

    const provider = this.discovery;
    this.refreshing = this.discoverAndReconcile(provider).finally(() => {
      this.refreshing = null;
    });
    return this.refreshing;
  }

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): OrchestratorConfig {
    return { ...this.config };
  }

  getRegistry(): WorkerRegistry {
    return this.registry;
  }

  getEngine(): AssignmentEngine {
    return this.engine;
  }

  getLoop(): ReconciliationLoop {
    return this.loop;
  }

  getMetrics(): OrchestratorMetrics | null {
    return this.metrics;
  }

  /**
   * Wait for scheduled snapshot saves to complete
   */
  async flush(): Promise<void> {
    await this.writer.flush();
  }

  private async discoverAndReconcile(provider: DiscoveryProvider): Promise<ReconcileResult | null> {
    let descriptors: WorkerDescriptor[];
    try {
      descriptors = await provider.discoverAll();
    } catch (err) {
      this.logger.error('worker_discovery_failed', errorFields(err));
      return null;
    }

    const result = this.reconciler.reconcileAll(descriptors);
    this.persist();
    return result;
  }

  private async restore(): Promise<void> {
    let snapshot: OrchestratorSnapshot | null;
    try {
      snapshot = await this.stateStore.load();
    } catch (err) {
      this.logger.error('snapshot_restore_failed', errorFields(err));
      return;
    }

    if (!snapshot) {
      return;
    }

    this.engine.restore(snapshot.tasks);
    this.registry.replaceAll(snapshot.workers);
    this.logger.info('snapshot_restored', {
      tasks: snapshot.tasks.length,
      workers: snapshot.workers.length,
      savedAt: snapshot.takenAt.toISOString(),
    });
  }

  /**
   * A stopped loop cannot restart, so each start after a stop gets a new one
   */
  private createLoop(): ReconciliationLoop {
    return new ReconciliationLoop(
      this.engine,
      {
        intervalMs: this.config.assignmentIntervalMs,
        errorBackoffMs: this.config.errorBackoffMs,
      },
      this.logger
    );
  }

  private startDiscoveryPolling(): void {
    if (!this.discovery || this.config.discoveryIntervalMs <= 0 || this.discoveryInterval) {
      return;
    }

    this.discoveryInterval = setInterval(() => {
      this.refreshWorkers().catch((err: unknown) => {
        this.logger.error('worker_refresh_failed', errorFields(err));
      });
    }, this.config.discoveryIntervalMs);
  }

  private persist(): void {
    this.writer.schedule(this.engine.getSnapshot());
    this.metrics?.refreshGauges(this.engine, this.registry);
  }
}
