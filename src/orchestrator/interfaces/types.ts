/**
 * Core types for the Agent Task Orchestrator
 */

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  redisUrl?: string;
  assignmentIntervalMs: number; // Default: 2000
  errorBackoffMs: number; // Default: 20000
  activityWindowMs: number; // Default: 120000
  discoveryIntervalMs: number; // Default: 30000, 0 disables periodic refresh
  stateKey: string;
  discoveryKey: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  assignmentIntervalMs: 2000,
  errorBackoffMs: 20000,
  activityWindowMs: 2 * 60 * 1000,
  discoveryIntervalMs: 30000,
  stateKey: 'orchestrator:state',
  discoveryKey: 'orchestrator:workers',
};

/**
 * Worker availability states
 */
export type WorkerStatus = 'idle' | 'busy' | 'error' | 'offline';

export const WORKER_STATUSES: readonly WorkerStatus[] = ['idle', 'busy', 'error', 'offline'];

/**
 * Worker state tracked by the registry
 */
export interface Worker {
  id: string;
  name: string;
  kind: string;
  resourceContext: string;
  status: WorkerStatus;
  lastActivity: Date;
  currentTaskRef?: string;
  sessionRef?: string;
}

/**
 * Input accepted by WorkerRegistry.register; omitted fields get defaults
 */
export interface WorkerRegistration {
  id: string;
  resourceContext: string;
  name?: string;
  kind?: string;
  status?: WorkerStatus;
  lastActivity?: Date;
  currentTaskRef?: string;
  sessionRef?: string;
}

export type TaskPriority = 'critical' | 'high' | 'normal' | 'low';

export const TASK_PRIORITIES: readonly TaskPriority[] = ['critical', 'high', 'normal', 'low'];

/**
 * Higher rank is scheduled first
 */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  critical: 3,
  high: 2,
  normal: 1,
  low: 0,
};

export type TaskStatus = 'pending' | 'assigned' | 'in_progress' | 'completed' | 'failed';

export const TASK_STATUSES: readonly TaskStatus[] = [
  'pending',
  'assigned',
  'in_progress',
  'completed',
  'failed',
];

/**
 * Unit of submitted work
 */
export interface Task {
  id: string;
  command: string;
  resourceContext: string;
  priority: TaskPriority;
  status: TaskStatus;
  workerId: string; // '' until assigned
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  result?: string;
}

/**
 * Point-in-time copy of all workers and tasks
 */
export interface OrchestratorSnapshot {
  workers: Worker[];
  tasks: Task[];
  takenAt: Date;
}

/**
 * Worker grouping by resource context
 */
export interface RepositorySummary {
  name: string;
  path: string;
  workers: Worker[];
  idleCount: number;
  busyCount: number;
  errorCount: number;
  offlineCount: number;
}

/**
 * Worker descriptor produced by a discovery provider
 */
export interface WorkerDescriptor {
  id: string;
  resourceContext: string;
  sessionRef: string;
  lastActivityTimestamp: Date;
  recentExecutorActivity: boolean;
  name?: string;
  kind?: string;
}

/**
 * Task lifecycle events raised by the assignment engine
 */
export type TaskEvent =
  | { type: 'task_enqueued'; task: Task }
  | { type: 'task_assigned'; task: Task; worker: Worker; affinity: boolean }
  | { type: 'task_status_changed'; task: Task; previousStatus: TaskStatus };

export function isWorkerStatus(value: unknown): value is WorkerStatus {
  return typeof value === 'string' && (WORKER_STATUSES as readonly string[]).includes(value);
}

export function isTaskPriority(value: unknown): value is TaskPriority {
  return typeof value === 'string' && (TASK_PRIORITIES as readonly string[]).includes(value);
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && (TASK_STATUSES as readonly string[]).includes(value);
}
