/**
 * Worker Registry - Manages worker state and availability
 */

import { Worker, WorkerRegistration, WorkerStatus } from '../interfaces/types';
import { normalizeContext } from './context';

/**
 * WorkerRegistry maintains a Map of worker states for O(1) lookups.
 *
 * Every method is synchronous and never yields, so each one runs to
 * completion before any other caller observes the map. Callers only ever
 * receive copies; mutation goes through the methods below.
 */
export class WorkerRegistry {
  private workers: Map<string, Worker> = new Map();

  /**
   * Register a new worker or replace an existing one with the same id.
   * Returns false only when the id is empty.
   */
  register(registration: WorkerRegistration): boolean {
    const worker = toWorker(registration);
    if (!worker) {
      return false;
    }

    this.workers.set(worker.id, worker);
    return true;
  }

  /**
   * Get worker state by ID
   */
  get(workerId: string): Worker | undefined {
    const worker = this.workers.get(workerId);
    return worker ? copyWorker(worker) : undefined;
  }

  /**
   * Update worker status.
   * The current task reference is only overwritten when a non-empty one is given.
   */
  updateStatus(workerId: string, status: WorkerStatus, currentTaskRef?: string): boolean {
    const worker = this.workers.get(workerId);
    if (!worker) {
      return false;
    }

    worker.status = status;
    worker.lastActivity = new Date();
    if (currentTaskRef) {
      worker.currentTaskRef = currentTaskRef;
    }
    return true;
  }

  /**
   * Get idle or busy workers, optionally bound to a resource context
   */
  findAvailable(resourceContext: string = ''): Worker[] {
    const wanted = resourceContext.trim() ? normalizeContext(resourceContext) : null;
    const available: Worker[] = [];

    for (const worker of this.workers.values()) {
      if (worker.status !== 'idle' && worker.status !== 'busy') {
        continue;
      }

      if (wanted !== null && normalizeContext(worker.resourceContext) !== wanted) {
        continue;
      }

      available.push(copyWorker(worker));
    }

    return available;
  }

  /**
   * Get all registered workers
   */
  getAll(): Worker[] {
    return Array.from(this.workers.values(), copyWorker);
  }

  /**
   * Get count of registered workers
   */
  size(): number {
    return this.workers.size;
  }

  /**
   * Replace the whole registry.
   * The new map is built first and swapped in with a single assignment,
   * so readers never see a partially filled registry.
   *
   * @returns Number of workers in the new registry
   */
  replaceAll(registrations: WorkerRegistration[]): number {
    const next = new Map<string, Worker>();

    for (const registration of registrations) {
      const worker = toWorker(registration);
      if (worker) {
        next.set(worker.id, worker);
      }
    }

    this.workers = next;
    return next.size;
  }

  /**
   * Clear all workers from registry
   */
  clearAll(): void {
    this.workers = new Map();
  }
}

function toWorker(registration: WorkerRegistration): Worker | null {
  const id = registration.id?.trim();
  if (!id) {
    return null;
  }

  const worker: Worker = {
    id,
    name: registration.name || id,
    kind: registration.kind || 'generic',
    resourceContext: registration.resourceContext ?? '',
    status: registration.status ?? 'idle',
    lastActivity: registration.lastActivity ? new Date(registration.lastActivity) : new Date(),
  };

  if (registration.currentTaskRef) {
    worker.currentTaskRef = registration.currentTaskRef;
  }
  if (registration.sessionRef) {
    worker.sessionRef = registration.sessionRef;
  }

  return worker;
}

function copyWorker(worker: Worker): Worker {
  return { ...worker, lastActivity: new Date(worker.lastActivity) };
}
