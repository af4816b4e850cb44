/**
 * API Request Handlers - Task submission, worker reporting and orchestrator controls
 */

import { Request, Response } from 'express';
import { OrchestratorService } from '../orchestrator';
import {
  OrchestratorSnapshot,
  RepositorySummary,
  Task,
  Worker,
  WorkerRegistration,
  isTaskPriority,
  isTaskStatus,
  isWorkerStatus,
} from '../interfaces/types';
import { ReconcileResult } from '../discovery/discovery-reconciler';

/**
 * Response types for API endpoints
 */
export interface StateResponse extends OrchestratorSnapshot {
  repositories: RepositorySummary[];
}

export interface WorkerListResponse {
  workers: Worker[];
  total: number;
  available: number;
}

export interface EnqueueRequest {
  command: string;
  resourceContext: string;
  priority?: string;
}

export interface EnqueueResponse {
  taskId: string;
  task: Task | null;
}

export interface RefreshResponse {
  refreshed: boolean;
  result: ReconcileResult | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

/**
 * Orchestrator API Handlers
 * Provides handlers for all orchestrator REST endpoints
 */
export class OrchestratorHandlers {
  private service: OrchestratorService;

  constructor(service: OrchestratorService) {
    this.service = service;
  }

  /**
   * GET /orchestrator/state
   * Returns every worker and task plus the per-repository summary
   */
  getState = (_req: Request, res: Response): void => {
    const snapshot = this.service.getSnapshot();
    const response: StateResponse = {
      ...snapshot,
      repositories: this.service.getRepositories(),
    };
    res.json(response);
  };

  /**
   * GET /orchestrator/workers
   */
  getWorkers = (_req: Request, res: Response): void => {
    const workers = this.service.getWorkers();
    const response: WorkerListResponse = {
      workers,
      total: workers.length,
      available: workers.filter((w) => w.status === 'idle').length,
    };
    res.json(response);
  };

  /**
   * POST /orchestrator/workers
   * Registers or replaces a worker
   */
  registerWorker = (req: Request, res: Response): void => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.id !== 'string' || !body.id.trim()) {
      this.badRequest(req, res, 'id is required');
      return;
    }
    if (typeof body.resourceContext !== 'string') {
      this.badRequest(req, res, 'resourceContext must be a string');
      return;
    }
    if (body.status !== undefined && !isWorkerStatus(body.status)) {
      this.badRequest(req, res, 'status must be one of idle, busy, error, offline');
      return;
    }
    if (
      !optionalString(body.name) ||
      !optionalString(body.kind) ||
      !optionalString(body.currentTaskRef) ||
      !optionalString(body.sessionRef)
    ) {
      this.badRequest(req, res, 'name, kind, currentTaskRef and sessionRef must be strings');
      return;
    }

    const registration: WorkerRegistration = {
      id: body.id,
      resourceContext: body.resourceContext,
      name: body.name,
      kind: body.kind,
      status: isWorkerStatus(body.status) ? body.status : undefined,
      currentTaskRef: body.currentTaskRef,
      sessionRef: body.sessionRef,
    };

    this.service.registerWorker(registration);
    res.status(201).json({
      registered: true,
      worker: this.service.getWorker(registration.id.trim()) ?? null,
    });
  };

  /**
   * DELETE /orchestrator/workers
   */
  clearWorkers = (_req: Request, res: Response): void => {
    const cleared = this.service.getWorkers().length;
    this.service.clearWorkers();
    res.json({ cleared });
  };

  /**
   * POST /orchestrator/workers/:workerId/status
   */
  updateWorkerStatus = (req: Request, res: Response): void => {
    const { workerId } = req.params;
    const body: unknown = req.body;

    if (!isRecord(body) || !isWorkerStatus(body.status)) {
      this.badRequest(req, res, 'status must be one of idle, busy, error, offline');
      return;
    }
    if (!optionalString(body.currentTaskRef)) {
      this.badRequest(req, res, 'currentTaskRef must be a string');
      return;
    }

    if (!this.service.updateWorkerStatus(workerId, body.status, body.currentTaskRef)) {
      this.notFound(req, res, `Worker ${workerId} not found`);
      return;
    }

    res.json({ updated: true, worker: this.service.getWorker(workerId) ?? null });
  };

  /**
   * GET /orchestrator/workers/:workerId/next-task
   * Oldest task assigned to the worker and not yet started
   */
  getNextTask = (req: Request, res: Response): void => {
    const { workerId } = req.params;
    res.json({ task: this.service.getNextTaskForWorker(workerId) ?? null });
  };

  /**
   * POST /orchestrator/tasks
   */
  enqueueTask = (req: Request, res: Response): void => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.command !== 'string' || !body.command.trim()) {
      this.badRequest(req, res, 'command is required');
      return;
    }
    if (typeof body.resourceContext !== 'string') {
      this.badRequest(req, res, 'resourceContext must be a string');
      return;
    }
    if (body.priority !== undefined && !isTaskPriority(body.priority)) {
      this.badRequest(req, res, 'priority must be one of critical, high, normal, low');
      return;
    }

    const priority = isTaskPriority(body.priority) ? body.priority : 'normal';
    const taskId = this.service.enqueue(body.command, body.resourceContext, priority);
    const response: EnqueueResponse = {
      taskId,
      task: this.service.getTask(taskId) ?? null,
    };
    res.status(201).json(response);
  };

  /**
   * POST /orchestrator/tasks/:taskId/status
   */
  updateTaskStatus = (req: Request, res: Response): void => {
    const { taskId } = req.params;
    const body: unknown = req.body;

    if (!isRecord(body) || !isTaskStatus(body.status)) {
      this.badRequest(
        req,
        res,
        'status must be one of pending, assigned, in_progress, completed, failed'
      );
      return;
    }
    if (!optionalString(body.result)) {
      this.badRequest(req, res, 'result must be a string');
      return;
    }

    const task = this.service.getTask(taskId);
    if (!task) {
      this.notFound(req, res, `Task ${taskId} not found`);
      return;
    }

    if (!this.service.updateTaskStatus(taskId, body.status, body.result)) {
      res.status(409).json({
        error: 'Conflict',
        message: `Task ${taskId} cannot move from ${task.status} to ${body.status}`,
        correlationId: req.correlationId,
      });
      return;
    }

    res.json({ updated: true, task: this.service.getTask(taskId) ?? null });
  };

  /**
   * POST /orchestrator/tasks/assign
   */
  triggerAssignment = (_req: Request, res: Response): void => {
    const assigned = this.service.triggerAssignment();
    res.json({ assigned });
  };

  /**
   * GET /orchestrator/repositories
   */
  getRepositories = (_req: Request, res: Response): void => {
    res.json({ repositories: this.service.getRepositories() });
  };

  /**
   * POST /orchestrator/refresh
   * Runs discovery now and replaces the worker set
   */
  refresh = async (_req: Request, res: Response): Promise<void> => {
    const result = await this.service.refreshWorkers();
    const response: RefreshResponse = {
      refreshed: result !== null,
      result,
    };
    res.json(response);
  };

  private badRequest(req: Request, res: Response, message: string): void {
    res.status(400).json({
      error: 'Bad Request',
      message,
      correlationId: req.correlationId,
    });
  }

  private notFound(req: Request, res: Response, message: string): void {
    res.status(404).json({
      error: 'Not Found',
      message,
      correlationId: req.correlationId,
    });
  }
}
