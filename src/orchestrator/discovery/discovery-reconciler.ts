/**
 * Discovery Reconciler - Replaces the registry with a freshly discovered worker set
 */

import { WorkerDescriptor, WorkerRegistration, WorkerStatus } from '../interfaces/types';
import { WorkerRegistry } from '../registry/worker-registry';
import { StructuredLogger } from '../metrics/logger';

export const DEFAULT_ACTIVITY_WINDOW_MS = 2 * 60 * 1000;

/**
 * A descriptor that could not be applied
 */
export interface SkippedDescriptor {
  index: number;
  id?: string;
  reason: string;
}

export interface ReconcileResult {
  registered: number;
  busy: number;
  idle: number;
  skipped: SkippedDescriptor[];
}

/**
 * Default status for a newly discovered worker.
 *
 * A worker whose executor wrote within the activity window counts as busy,
 * anything else as idle. Discovery never yields error or offline: a worker that
 * shows up in discovery is available to take work.
 */
export function classify(
  descriptor: WorkerDescriptor,
  now: Date = new Date(),
  activityWindowMs: number = DEFAULT_ACTIVITY_WINDOW_MS
): WorkerStatus {
  if (!descriptor.recentExecutorActivity) {
    return 'idle';
  }

  const ageMs = Math.max(0, now.getTime() - descriptor.lastActivityTimestamp.getTime());
  return ageMs <= activityWindowMs ? 'busy' : 'idle';
}

/**
 * Reason a descriptor is unusable, or null when it can be registered
 */
export function validateDescriptor(descriptor: unknown): string | null {
  if (!isRecord(descriptor)) {
    return 'not an object';
  }
  if (typeof descriptor.id !== 'string' || !descriptor.id.trim()) {
    return 'missing id';
  }
  if (typeof descriptor.resourceContext !== 'string') {
    return 'missing resource context';
  }
  if (
    !(descriptor.lastActivityTimestamp instanceof Date) ||
    Number.isNaN(descriptor.lastActivityTimestamp.getTime())
  ) {
    return 'invalid last activity timestamp';
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function descriptorId(value: unknown): string | undefined {
  return isRecord(value) && typeof value.id === 'string' && value.id ? value.id : undefined;
}

export class DiscoveryReconciler {
  private registry: WorkerRegistry;
  private activityWindowMs: number;
  private logger: StructuredLogger;

  constructor(
    registry: WorkerRegistry,
    activityWindowMs: number = DEFAULT_ACTIVITY_WINDOW_MS,
    logger: StructuredLogger = new StructuredLogger()
  ) {
    this.registry = registry;
    this.activityWindowMs = activityWindowMs;
    this.logger = logger;
  }

  /**
   * Replace the registry with the given descriptors.
   *
   * Workers absent from the batch are dropped even when a task still points at
   * them. Broken descriptors are skipped; the rest of the batch is applied.
   */
  reconcileAll(
    descriptors: ReadonlyArray<WorkerDescriptor | null | undefined>,
    now: Date = new Date()
  ): ReconcileResult {
    const byId = new Map<string, WorkerRegistration>();
    const skipped: SkippedDescriptor[] = [];

    descriptors.forEach((descriptor, index) => {
      const problem = validateDescriptor(descriptor);
      if (problem || !descriptor) {
        skipped.push({
          index,
          id: descriptorId(descriptor),
          reason: problem ?? 'not an object',
        });
        return;
      }

      const id = descriptor.id.trim();
      // Later duplicates win
      byId.delete(id);
      byId.set(id, {
        id,
        name: descriptor.name || id,
        kind: descriptor.kind || 'discovered',
        resourceContext: descriptor.resourceContext,
        status: classify(descriptor, now, this.activityWindowMs),
        lastActivity: descriptor.lastActivityTimestamp,
        sessionRef: descriptor.sessionRef || undefined,
      });
    });

    const registrations = Array.from(byId.values());
    const registered = this.registry.replaceAll(registrations);
    const busy = registrations.filter((r) => r.status === 'busy').length;

    for (const skip of skipped) {
      this.logger.warn('discovery_descriptor_skipped', { ...skip });
    }
    this.logger.info('workers_reconciled', {
      registered,
      busy,
      idle: registered - busy,
      skipped: skipped.length,
    });

    return {
      registered,
      busy,
      idle: registered - busy,
      skipped,
    };
  }
}
