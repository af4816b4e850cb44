/**
 * Structured Logger for Orchestrator Observability
 *
 * Emits one JSON object per line with a correlation ID so that a task can be
 * followed from enqueue through assignment to completion.
 */

import { v4 as uuidv4 } from 'uuid';
import { Task, Worker } from '../interfaces/types';

/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** Log level */
  level: LogLevel;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Correlation ID for tracing */
  correlationId: string;
  /** Event type */
  event: string;
  /** Additional data fields */
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel?: LogLevel;
  /** Custom log output function */
  output?: (entry: LogEntry) => void;
}

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: Required<LoggerConfig> = {
  minLevel: 'info',
  output: (entry) => {
    const line = JSON.stringify(entry);
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  },
};

/**
 * Log level priority mapping
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_PRIORITY;
}

/**
 * Flatten an unknown thrown value into log fields
 */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.name, message: err.message, stack: err.stack };
  }
  return { error: 'Error', message: String(err) };
}

export class StructuredLogger {
  private config: Required<LoggerConfig>;
  private correlationId: string;

  constructor(config: LoggerConfig = {}, correlationId?: string) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.correlationId = correlationId || uuidv4();
  }

  /**
   * Create a child logger with a new correlation ID
   */
  child(correlationId?: string): StructuredLogger {
    return new StructuredLogger(this.config, correlationId || uuidv4());
  }

  /**
   * Create a child logger for a specific task
   */
  forTask(taskId: string): StructuredLogger {
    return this.child(`task-${taskId}`);
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  /**
   * Log a task being matched to a worker
   */
  logAssignment(task: Task, worker: Worker, affinity: boolean): void {
    this.forTask(task.id).info('task_assigned', {
      taskId: task.id,
      workerId: worker.id,
      priority: task.priority,
      resourceContext: task.resourceContext,
      affinity,
      waitMs: task.startedAt ? task.startedAt.getTime() - task.createdAt.getTime() : undefined,
    });
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      timestamp: new Date().toISOString(),
      correlationId: this.correlationId,
      event,
      ...data,
    };

    this.config.output(entry);
  }
}
