/**
 * Snapshot (de)serialization shared by the state stores
 */

import {
  OrchestratorSnapshot,
  Task,
  Worker,
  isTaskPriority,
  isTaskStatus,
  isWorkerStatus,
} from '../interfaces/types';

export const SNAPSHOT_VERSION = 1;

/**
 * Serialized snapshot for storage
 */
export interface SerializedSnapshot {
  version: number;
  savedAt: string;
  workers: Array<Omit<Worker, 'lastActivity'> & { lastActivity: string }>;
  tasks: Array<
    Omit<Task, 'createdAt' | 'startedAt' | 'completedAt'> & {
      createdAt: string;
      startedAt?: string;
      completedAt?: string;
    }
  >;
}

export function serializeSnapshot(snapshot: OrchestratorSnapshot): string {
  const serialized: SerializedSnapshot = {
    version: SNAPSHOT_VERSION,
    savedAt: snapshot.takenAt.toISOString(),
    workers: snapshot.workers.map((worker) => ({
      ...worker,
      lastActivity: worker.lastActivity.toISOString(),
    })),
    tasks: snapshot.tasks.map((task) => ({
      ...task,
      createdAt: task.createdAt.toISOString(),
      startedAt: task.startedAt?.toISOString(),
      completedAt: task.completedAt?.toISOString(),
    })),
  };

  return JSON.stringify(serialized);
}

/**
 * Parse a stored snapshot.
 * Entries that do not describe a valid worker or task are dropped;
 * a document that is not a snapshot at all throws.
 */
export function deserializeSnapshot(data: string): OrchestratorSnapshot {
  const parsed: unknown = JSON.parse(data);
  if (!isRecord(parsed) || !Array.isArray(parsed.workers) || !Array.isArray(parsed.tasks)) {
    throw new Error('Stored state is not an orchestrator snapshot');
  }
  if (parsed.version !== SNAPSHOT_VERSION) {
    throw new Error(`Unsupported snapshot version: ${String(parsed.version)}`);
  }

  const takenAt = parseDate(parsed.savedAt) ?? new Date();
  const workers: Worker[] = [];
  const tasks: Task[] = [];

  for (const entry of parsed.workers) {
    const worker = parseWorker(entry);
    if (worker) {
      workers.push(worker);
    }
  }

  for (const entry of parsed.tasks) {
    const task = parseTask(entry);
    if (task) {
      tasks.push(task);
    }
  }

  return { workers, tasks, takenAt };
}

function parseWorker(entry: unknown): Worker | null {
  if (!isRecord(entry)) {
    return null;
  }

  const lastActivity = parseDate(entry.lastActivity);
  if (
    typeof entry.id !== 'string' ||
    !entry.id ||
    typeof entry.resourceContext !== 'string' ||
    !isWorkerStatus(entry.status) ||
    !lastActivity
  ) {
    return null;
  }

  const worker: Worker = {
    id: entry.id,
    name: typeof entry.name === 'string' ? entry.name : entry.id,
    kind: typeof entry.kind === 'string' ? entry.kind : 'generic',
    resourceContext: entry.resourceContext,
    status: entry.status,
    lastActivity,
  };
  if (typeof entry.currentTaskRef === 'string') {
    worker.currentTaskRef = entry.currentTaskRef;
  }
  if (typeof entry.sessionRef === 'string') {
    worker.sessionRef = entry.sessionRef;
  }
  return worker;
}

function parseTask(entry: unknown): Task | null {
  if (!isRecord(entry)) {
    return null;
  }

  const createdAt = parseDate(entry.createdAt);
  if (
    typeof entry.id !== 'string' ||
    !entry.id ||
    typeof entry.command !== 'string' ||
    typeof entry.resourceContext !== 'string' ||
    !isTaskPriority(entry.priority) ||
    !isTaskStatus(entry.status) ||
    typeof entry.workerId !== 'string' ||
    !createdAt
  ) {
    return null;
  }

  const task: Task = {
    id: entry.id,
    command: entry.command,
    resourceContext: entry.resourceContext,
    priority: entry.priority,
    status: entry.status,
    workerId: entry.workerId,
    createdAt,
  };

  const startedAt = parseDate(entry.startedAt);
  if (startedAt) {
    task.startedAt = startedAt;
  }
  const completedAt = parseDate(entry.completedAt);
  if (completedAt) {
    task.completedAt = completedAt;
  }
  if (typeof entry.result === 'string') {
    task.result = entry.result;
  }
  return task;
}

function parseDate(value: unknown): Date | null {
  if (typeof value !== 'string') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
