/**
 * Assignment Engine - Owns the task queue and matches tasks to idle workers
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import {
  OrchestratorSnapshot,
  PRIORITY_RANK,
  Task,
  TaskEvent,
  TaskPriority,
  TaskStatus,
  Worker,
} from '../interfaces/types';
import { WorkerRegistry } from '../registry/worker-registry';
import { contextsMatch } from '../registry/context';
import { StructuredLogger, errorFields } from '../metrics/logger';

/**
 * Forward-only task transitions reachable through updateTaskStatus.
 * pending -> assigned only happens inside a sweep, where a worker is chosen.
 */
const ALLOWED_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['failed'],
  assigned: ['in_progress', 'completed', 'failed'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === 'completed' || status === 'failed';
}

/**
 * Queue order: priority descending, then oldest first.
 * Array.prototype.sort is stable, so equal timestamps keep insertion order.
 */
export function compareQueueOrder(a: Task, b: Task): number {
  const rankDiff = PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority];
  if (rankDiff !== 0) {
    return rankDiff;
  }
  return a.createdAt.getTime() - b.createdAt.getTime();
}

interface WorkerMatch {
  worker: Worker;
  affinity: boolean;
}

/**
 * AssignmentEngine keeps the task queue and pairs pending tasks with idle workers.
 *
 * All mutation runs inside one exclusive region. The region is synchronous, so
 * "pick an idle worker" and "mark it busy" cannot interleave with another
 * enqueue, sweep or status update. Events raised inside the region are
 * delivered on the `taskEvent` channel once the outermost call has finished.
 */
export class AssignmentEngine extends EventEmitter {
  private registry: WorkerRegistry;
  private logger: StructuredLogger;
  private tasks: Task[] = [];
  private regionDepth: number = 0;
  private pendingEvents: TaskEvent[] = [];

  constructor(registry: WorkerRegistry, logger: StructuredLogger = new StructuredLogger()) {
    super();
    this.registry = registry;
    this.logger = logger;
  }

  /**
   * Queue a task and try to place it immediately.
   * Always finishes with a full sweep so older pending tasks get a chance too.
   */
  enqueue(command: string, resourceContext: string, priority: TaskPriority = 'normal'): string {
    return this.exclusive(() => {
      const task: Task = {
        id: uuidv4(),
        command,
        resourceContext,
        priority,
        status: 'pending',
        workerId: '',
        createdAt: new Date(),
      };

      this.tasks.push(task);
      this.raise({ type: 'task_enqueued', task: copyTask(task) });
      this.logger.debug('task_enqueued', {
        taskId: task.id,
        priority,
        resourceContext,
      });

      this.tryAssign(task);
      this.assignPending();

      return task.id;
    });
  }

  /**
   * Pick the idle worker best suited for a resource context.
   * Prefers a matching context, then the worker idle the longest.
   */
  findBestWorker(resourceContext: string): Worker | undefined {
    return this.selectWorker(resourceContext)?.worker;
  }

  /**
   * Sweep all pending tasks in queue order.
   *
   * @returns Number of tasks assigned by this sweep
   */
  assignUnassignedTasks(): number {
    return this.exclusive(() => this.assignPending());
  }

  /**
   * Same sweep as assignUnassignedTasks, exposed for external triggers
   */
  triggerAssignment(): number {
    return this.assignUnassignedTasks();
  }

  /**
   * Apply a status reported by a worker.
   * Rejects unknown tasks, backward moves and changes to finished tasks.
   * Worker status is left alone; workers report their own availability.
   */
  updateTaskStatus(taskId: string, status: TaskStatus, result?: string): boolean {
    return this.exclusive(() => {
      const task = this.tasks.find((t) => t.id === taskId);
      if (!task) {
        return false;
      }

      const previousStatus = task.status;
      if (!ALLOWED_TRANSITIONS[previousStatus].includes(status)) {
        this.logger.warn('task_transition_rejected', {
          taskId,
          from: previousStatus,
          to: status,
        });
        return false;
      }

      task.status = status;
      if (isTerminalStatus(status)) {
        task.completedAt = new Date();
      }
      if (result !== undefined) {
        task.result = result;
      }

      this.raise({ type: 'task_status_changed', task: copyTask(task), previousStatus });
      return true;
    });
  }

  /**
   * Oldest task assigned to a worker that it has not started yet
   */
  getNextTaskForWorker(workerId: string): Task | undefined {
    const next = this.tasks
      .filter((t) => t.workerId === workerId && t.status === 'assigned')
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())[0];
    return next ? copyTask(next) : undefined;
  }

  getTask(taskId: string): Task | undefined {
    const task = this.tasks.find((t) => t.id === taskId);
    return task ? copyTask(task) : undefined;
  }

  /**
   * All tasks in submission order
   */
  getTasks(): Task[] {
    return this.tasks.map(copyTask);
  }

  /**
   * Number of tasks still waiting for a worker
   */
  pendingCount(): number {
    return this.tasks.filter((t) => t.status === 'pending').length;
  }

  getSnapshot(): OrchestratorSnapshot {
    return this.exclusive(() => ({
      workers: this.registry.getAll(),
      tasks: this.getTasks(),
      takenAt: new Date(),
    }));
  }

  /**
   * Replace the queue with previously persisted tasks
   */
  restore(tasks: Task[]): void {
    this.exclusive(() => {
      this.tasks = tasks.map(copyTask);
    });
  }

  private assignPending(): number {
    const pending = this.tasks
      .filter((t) => t.status === 'pending')
      .sort(compareQueueOrder);

    let assigned = 0;
    for (const task of pending) {
      if (this.tryAssign(task)) {
        assigned++;
      }
    }
    return assigned;
  }

  /**
   * Assign one pending task and flip its worker to busy in the same step
   */
  private tryAssign(task: Task): boolean {
    if (task.status !== 'pending') {
      return false;
    }

    const match = this.selectWorker(task.resourceContext);
    if (!match) {
      return false;
    }

    if (!this.registry.updateStatus(match.worker.id, 'busy', task.id)) {
      return false;
    }

    task.status = 'assigned';
    task.workerId = match.worker.id;
    task.startedAt = new Date();

    const worker = this.registry.get(match.worker.id) ?? match.worker;
    this.logger.logAssignment(task, worker, match.affinity);
    this.raise({
      type: 'task_assigned',
      task: copyTask(task),
      worker,
      affinity: match.affinity,
    });
    return true;
  }

  private selectWorker(resourceContext: string): WorkerMatch | undefined {
    const idle = this.registry
      .findAvailable()
      .filter((w) => w.status === 'idle')
      .sort((a, b) => a.lastActivity.getTime() - b.lastActivity.getTime());

    if (idle.length === 0) {
      return undefined;
    }

    if (resourceContext.trim()) {
      const match = idle.find((w) => contextsMatch(w.resourceContext, resourceContext));
      if (match) {
        return { worker: match, affinity: true };
      }
    }

    return { worker: idle[0], affinity: false };
  }

  private exclusive<T>(operation: () => T): T {
    this.regionDepth++;
    try {
      return operation();
    } finally {
      this.regionDepth--;
      if (this.regionDepth === 0) {
        this.flushEvents();
      }
    }
  }

  private raise(event: TaskEvent): void {
    this.pendingEvents.push(event);
  }

  private flushEvents(): void {
    const events = this.pendingEvents;
    this.pendingEvents = [];

    for (const event of events) {
      try {
        this.emit('taskEvent', event);
      } catch (err) {
        this.logger.error('task_event_listener_failed', {
          type: event.type,
          taskId: event.task.id,
          ...errorFields(err),
        });
      }
    }
  }
}

export function copyTask(task: Task): Task {
  const copy: Task = { ...task, createdAt: new Date(task.createdAt) };
  if (task.startedAt) {
    copy.startedAt = new Date(task.startedAt);
  }
  if (task.completedAt) {
    copy.completedAt = new Date(task.completedAt);
  }
  return copy;
}
