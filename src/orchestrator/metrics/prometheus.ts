/**
 * Prometheus Metrics Client for the Agent Task Orchestrator
 *
 * Exposes metrics for task flow, assignment latency, worker availability
 * and reconciliation loop health. Attached to the engine and loop as an
 * observer; neither depends on it.
 */

import {
  Registry,
  Counter,
  Histogram,
  Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import { AssignmentEngine } from '../engine/assignment-engine';
import { CycleResult, ReconciliationLoop } from '../loop/reconciliation-loop';
import { TaskEvent, Worker, WORKER_STATUSES } from '../interfaces/types';
import { WorkerRegistry } from '../registry/worker-registry';

/**
 * Metrics configuration options
 */
export interface MetricsConfig {
  /** Prefix for all metric names */
  prefix?: string;
  /** Custom labels to add to all metrics */
  defaultLabels?: Record<string, string>;
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean;
  /** Buckets for the enqueue-to-assignment histogram (in ms) */
  waitBuckets?: number[];
}

/**
 * Default metrics configuration
 */
export const DEFAULT_METRICS_CONFIG: Required<MetricsConfig> = {
  prefix: 'orchestrator_',
  defaultLabels: {},
  collectDefaultMetrics: true,
  waitBuckets: [10, 100, 500, 1000, 2000, 5000, 10000, 30000, 60000, 300000],
};

export type CycleOutcome = 'assigned' | 'idle' | 'error';

export class OrchestratorMetrics {
  private registry: Registry;
  private config: Required<MetricsConfig>;

  /** Counter: Tasks accepted by enqueue */
  public readonly tasksEnqueued: Counter<'priority'>;

  /** Counter: Assignments, split by whether the worker's context matched */
  public readonly tasksAssigned: Counter<'affinity'>;

  /** Counter: Status transitions reported by workers */
  public readonly taskTransitions: Counter<'status'>;

  /** Histogram: Time from enqueue to assignment (ms) */
  public readonly assignmentWait: Histogram<string>;

  /** Gauge: Tasks waiting for a worker */
  public readonly queueDepth: Gauge<string>;

  /** Gauge: Registered workers by status */
  public readonly workers: Gauge<'status'>;

  /** Counter: Reconciliation cycles by outcome */
  public readonly cycles: Counter<'outcome'>;

  constructor(config: MetricsConfig = {}) {
    this.config = { ...DEFAULT_METRICS_CONFIG, ...config };
    this.registry = new Registry();

    if (Object.keys(this.config.defaultLabels).length > 0) {
      this.registry.setDefaultLabels(this.config.defaultLabels);
    }

    if (this.config.collectDefaultMetrics) {
      collectDefaultMetrics({ register: this.registry });
    }

    const prefix = this.config.prefix;

    this.tasksEnqueued = new Counter({
      name: `${prefix}tasks_enqueued_total`,
      help: 'Total number of tasks enqueued',
      labelNames: ['priority'] as const,
      registers: [this.registry],
    });

    this.tasksAssigned = new Counter({
      name: `${prefix}tasks_assigned_total`,
      help: 'Total number of tasks assigned to workers',
      labelNames: ['affinity'] as const,
      registers: [this.registry],
    });

    this.taskTransitions = new Counter({
      name: `${prefix}task_transitions_total`,
      help: 'Total number of task status transitions reported by workers',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.assignmentWait = new Histogram({
      name: `${prefix}assignment_wait_ms`,
      help: 'Time tasks spend pending before assignment (ms)',
      buckets: this.config.waitBuckets,
      registers: [this.registry],
    });

    this.queueDepth = new Gauge({
      name: `${prefix}queue_depth`,
      help: 'Current number of pending tasks',
      registers: [this.registry],
    });

    this.workers = new Gauge({
      name: `${prefix}workers`,
      help: 'Number of registered workers by status',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.cycles = new Counter({
      name: `${prefix}reconciliation_cycles_total`,
      help: 'Total number of reconciliation cycles by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });
  }

  /**
   * Attach to engine and loop events.
   * Gauges are refreshed from the engine after every task event and cycle.
   */
  observe(engine: AssignmentEngine, loop?: ReconciliationLoop, registry?: WorkerRegistry): void {
    engine.on('taskEvent', (event: TaskEvent) => {
      this.recordTaskEvent(event);
      this.refreshGauges(engine, registry);
    });

    if (loop) {
      this.observeLoop(loop, engine, registry);
    }
  }

  /**
   * Attach to a loop only; used when a service replaces a stopped loop
   */
  observeLoop(loop: ReconciliationLoop, engine: AssignmentEngine, registry?: WorkerRegistry): void {
    loop.on('cycle', (result: CycleResult) => {
      this.recordCycle(result.assigned > 0 ? 'assigned' : 'idle');
      this.refreshGauges(engine, registry);
    });
    loop.on('cycleError', () => {
      this.recordCycle('error');
    });
  }

  /**
   * Set queue depth and worker gauges from current state
   */
  refreshGauges(engine: AssignmentEngine, registry?: WorkerRegistry): void {
    this.updateQueueDepth(engine.pendingCount());
    if (registry) {
      this.updateWorkerCounts(registry.getAll());
    }
  }

  recordTaskEvent(event: TaskEvent): void {
    switch (event.type) {
      case 'task_enqueued':
        this.tasksEnqueued.inc({ priority: event.task.priority });
        break;
      case 'task_assigned':
        this.tasksAssigned.inc({ affinity: event.affinity ? 'matched' : 'fallback' });
        if (event.task.startedAt) {
          this.assignmentWait.observe(
            event.task.startedAt.getTime() - event.task.createdAt.getTime()
          );
        }
        break;
      case 'task_status_changed':
        this.taskTransitions.inc({ status: event.task.status });
        break;
    }
  }

  recordCycle(outcome: CycleOutcome): void {
    this.cycles.inc({ outcome });
  }

  updateQueueDepth(depth: number): void {
    this.queueDepth.set(depth);
  }

  updateWorkerCounts(workers: Worker[]): void {
    for (const status of WORKER_STATUSES) {
      this.workers.set({ status }, workers.filter((w) => w.status === status).length);
    }
  }

  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Get metrics in Prometheus text format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  /**
   * Clear all metrics and remove them from registry
   */
  clear(): void {
    this.registry.clear();
  }
}
