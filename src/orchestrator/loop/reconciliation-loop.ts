/**
 * Reconciliation Loop - Periodically re-runs assignment so waiting tasks reach
 * workers that became idle after the task was queued
 */

import { EventEmitter } from 'events';
import { AssignmentEngine } from '../engine/assignment-engine';
import { StructuredLogger, errorFields } from '../metrics/logger';

/**
 * Configuration for ReconciliationLoop
 */
export interface ReconciliationLoopConfig {
  intervalMs?: number;
  errorBackoffMs?: number;
}

const DEFAULT_CONFIG: Required<ReconciliationLoopConfig> = {
  intervalMs: 2000,
  errorBackoffMs: 20000,
};

export type LoopState = 'idle' | 'running' | 'stopped';

/**
 * Outcome of one cycle
 */
export interface CycleResult {
  unassigned: number;
  available: number;
  assigned: number;
  triggered: boolean;
}

/**
 * Resolve after `ms`, or as soon as the signal aborts
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * ReconciliationLoop drives AssignmentEngine.triggerAssignment on a fixed interval.
 *
 * Emits `cycle` with a CycleResult after every completed cycle and `cycleError`
 * when a cycle throws. A failed cycle is followed by the longer backoff wait.
 * Once stopped the loop cannot be restarted.
 */
export class ReconciliationLoop extends EventEmitter {
  private engine: AssignmentEngine;
  private config: Required<ReconciliationLoopConfig>;
  private logger: StructuredLogger;
  private state: LoopState = 'idle';
  private abortController: AbortController | null = null;
  private running: Promise<void> | null = null;

  constructor(
    engine: AssignmentEngine,
    config: ReconciliationLoopConfig = {},
    logger: StructuredLogger = new StructuredLogger()
  ) {
    super();
    this.engine = engine;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = logger;
  }

  /**
   * Start ticking. Returns false if the loop is already running or was stopped.
   */
  start(): boolean {
    if (this.state !== 'idle') {
      return false;
    }

    this.state = 'running';
    this.abortController = new AbortController();
    this.running = this.run(this.abortController.signal);
    this.logger.info('reconciliation_loop_started', {
      intervalMs: this.config.intervalMs,
      errorBackoffMs: this.config.errorBackoffMs,
    });
    return true;
  }

  /**
   * Cancel the loop and wait for the current cycle to finish
   */
  async stop(): Promise<void> {
    if (this.state === 'idle') {
      this.state = 'stopped';
      return;
    }

    this.abortController?.abort();
    if (this.running) {
      await this.running;
    }
    this.state = 'stopped';
  }

  getState(): LoopState {
    return this.state;
  }

  /**
   * Run one cycle: trigger a sweep when both waiting tasks and idle workers exist
   */
  processCycle(): CycleResult {
    const before = this.engine.getSnapshot();
    const unassigned = before.tasks.filter((t) => t.status === 'pending' && !t.workerId).length;
    const available = before.workers.filter((w) => w.status === 'idle').length;

    if (unassigned === 0 || available === 0) {
      if (unassigned > 0) {
        this.logger.debug('reconciliation_waiting_for_workers', { unassigned });
      }
      return { unassigned, available, assigned: 0, triggered: false };
    }

    this.logger.info('reconciliation_triggered', { unassigned, available });
    this.engine.triggerAssignment();

    const after = this.engine.getSnapshot();
    const remaining = after.tasks.filter((t) => t.status === 'pending' && !t.workerId).length;
    const assigned = unassigned - remaining;

    if (assigned > 0) {
      this.logger.info('reconciliation_assigned', { assigned, remaining });
    }

    return { unassigned, available, assigned, triggered: true };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let waitMs = this.config.intervalMs;

      try {
        const result = this.processCycle();
        this.emit('cycle', result);
      } catch (err) {
        waitMs = this.config.errorBackoffMs;
        this.logger.error('reconciliation_cycle_failed', {
          backoffMs: waitMs,
          ...errorFields(err),
        });
        this.emit('cycleError', err instanceof Error ? err : new Error(String(err)));
      }

      await abortableSleep(waitMs, signal);
    }

    this.logger.info('reconciliation_loop_stopped');
  }
}
