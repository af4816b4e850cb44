/**
 * Unit tests for AssignmentEngine
 */

import { AssignmentEngine, compareQueueOrder } from './assignment-engine';
import { WorkerRegistry } from '../registry/worker-registry';
import { StructuredLogger, LogEntry } from '../metrics/logger';
import { Task, TaskEvent, WorkerRegistration } from '../interfaces/types';

describe('AssignmentEngine', () => {
  let registry: WorkerRegistry;
  let engine: AssignmentEngine;
  let logs: LogEntry[];

  const createRegistration = (
    id: string,
    resourceContext: string,
    overrides: Partial<WorkerRegistration> = {}
  ): WorkerRegistration => ({
    id,
    resourceContext,
    ...overrides,
  });

  beforeEach(() => {
    logs = [];
    registry = new WorkerRegistry();
    engine = new AssignmentEngine(
      registry,
      new StructuredLogger({ minLevel: 'debug', output: (entry) => logs.push(entry) })
    );
  });

  describe('enqueue', () => {
    it('should leave the task pending when no worker is idle', () => {
      const taskId = engine.enqueue('npm test', '/work/web');

      const task = engine.getTask(taskId);
      expect(task?.status).toBe('pending');
      expect(task?.workerId).toBe('');
      expect(task?.priority).toBe('normal');
      expect(engine.pendingCount()).toBe(1);
    });

    it('should assign immediately and mark the worker busy', () => {
      registry.register(createRegistration('w1', '/work/web'));

      const taskId = engine.enqueue('npm test', '/work/web', 'high');

      const task = engine.getTask(taskId);
      expect(task?.status).toBe('assigned');
      expect(task?.workerId).toBe('w1');
      expect(task?.startedAt).toBeInstanceOf(Date);
      expect(registry.get('w1')?.status).toBe('busy');
      expect(registry.get('w1')?.currentTaskRef).toBe(taskId);
    });

    it('should return distinct ids', () => {
      const a = engine.enqueue('a', '');
      const b = engine.enqueue('b', '');
      expect(a).not.toBe(b);
    });
  });

  describe('findBestWorker', () => {
    it('should prefer a worker in the same context', () => {
      registry.register(
        createRegistration('api', '/work/api', { lastActivity: new Date('2024-01-01T00:00:00Z') })
      );
      registry.register(
        createRegistration('web', 'C:\\Work\\Web\\', { lastActivity: new Date('2024-01-02T00:00:00Z') })
      );

      expect(engine.findBestWorker('c:/work/web')?.id).toBe('web');
    });

    it('should fall back to the worker idle the longest', () => {
      registry.register(
        createRegistration('recent', '/work/api', { lastActivity: new Date('2024-01-03T00:00:00Z') })
      );
      registry.register(
        createRegistration('oldest', '/work/web', { lastActivity: new Date('2024-01-01T00:00:00Z') })
      );

      expect(engine.findBestWorker('/work/docs')?.id).toBe('oldest');
      expect(engine.findBestWorker('')?.id).toBe('oldest');
    });

    it('should ignore busy, error and offline workers', () => {
      registry.register(createRegistration('busy', '/work/web', { status: 'busy' }));
      registry.register(createRegistration('error', '/work/web', { status: 'error' }));
      registry.register(createRegistration('offline', '/work/web', { status: 'offline' }));

      expect(engine.findBestWorker('/work/web')).toBeUndefined();
    });
  });

  describe('assignUnassignedTasks', () => {
    it('should give each idle worker at most one task per sweep', () => {
      engine.enqueue('one', '/work/web');
      engine.enqueue('two', '/work/web');
      engine.enqueue('three', '/work/web');
      registry.register(createRegistration('w1', '/work/web'));
      registry.register(createRegistration('w2', '/work/api'));

      expect(engine.assignUnassignedTasks()).toBe(2);

      const assigned = engine.getTasks().filter((t) => t.status === 'assigned');
      expect(assigned.map((t) => t.workerId).sort()).toEqual(['w1', 'w2']);
      expect(engine.pendingCount()).toBe(1);
    });

    it('should assign nothing on a second sweep without new idle workers', () => {
      engine.enqueue('one', '/work/web');
      engine.enqueue('two', '/work/web');
      registry.register(createRegistration('w1', '/work/web'));

      expect(engine.assignUnassignedTasks()).toBe(1);
      expect(engine.assignUnassignedTasks()).toBe(0);
      expect(engine.triggerAssignment()).toBe(0);
    });

    it('should serve higher priority tasks first, oldest first within a priority', () => {
      const low = engine.enqueue('low', '');
      const normalFirst = engine.enqueue('normal-1', '');
      const critical = engine.enqueue('critical', '', 'critical');
      const normalSecond = engine.enqueue('normal-2', '');
      registry.register(createRegistration('w1', '/work/web'));

      expect(engine.triggerAssignment()).toBe(1);
      expect(engine.getTask(critical)?.workerId).toBe('w1');

      registry.updateStatus('w1', 'idle');
      expect(engine.triggerAssignment()).toBe(1);
      expect(engine.getTask(normalFirst)?.status).toBe('assigned');
      expect(engine.getTask(normalSecond)?.status).toBe('pending');
      expect(engine.getTask(low)?.status).toBe('pending');
    });

    it('should drain critical, high, then normal tasks in creation order', () => {
      const normalFirst = engine.enqueue('normal-1', '', 'normal');
      const critical = engine.enqueue('critical', '', 'critical');
      const normalSecond = engine.enqueue('normal-2', '', 'normal');
      const high = engine.enqueue('high', '', 'high');
      registry.register(createRegistration('w1', '/work/web'));

      const order: string[] = [];
      for (let sweep = 0; sweep < 4; sweep++) {
        registry.updateStatus('w1', 'idle');
        engine.triggerAssignment();
        order.push(registry.get('w1')?.currentTaskRef ?? '');
      }

      expect(order).toEqual([critical, high, normalFirst, normalSecond]);
    });

    it('should place a task on a matching worker before falling back', () => {
      engine.enqueue('web task', '/work/web');
      registry.register(
        createRegistration('api', '/work/api', { lastActivity: new Date('2024-01-01T00:00:00Z') })
      );
      registry.register(
        createRegistration('web', '/work/web', { lastActivity: new Date('2024-01-05T00:00:00Z') })
      );

      engine.triggerAssignment();

      const [task] = engine.getTasks();
      expect(task.workerId).toBe('web');
      expect(registry.get('api')?.status).toBe('idle');
    });
  });

  describe('updateTaskStatus', () => {
    let taskId: string;

    beforeEach(() => {
      registry.register(createRegistration('w1', '/work/web'));
      taskId = engine.enqueue('npm test', '/work/web');
    });

    it('should move an assigned task forward and record the result', () => {
      expect(engine.updateTaskStatus(taskId, 'in_progress')).toBe(true);
      expect(engine.updateTaskStatus(taskId, 'completed', 'all green')).toBe(true);

      const task = engine.getTask(taskId);
      expect(task?.status).toBe('completed');
      expect(task?.result).toBe('all green');
      expect(task?.completedAt).toBeInstanceOf(Date);
    });

    it('should reject changes to a finished task', () => {
      engine.updateTaskStatus(taskId, 'failed', 'exit 1');

      expect(engine.updateTaskStatus(taskId, 'in_progress')).toBe(false);
      expect(engine.getTask(taskId)?.status).toBe('failed');
    });

    it('should reject moving back to pending', () => {
      expect(engine.updateTaskStatus(taskId, 'pending')).toBe(false);
      expect(logs.find((l) => l.event === 'task_transition_rejected')).toMatchObject({
        level: 'warn',
        taskId,
        from: 'assigned',
        to: 'pending',
      });
    });

    it('should allow failing a pending task but not completing it', () => {
      const pendingId = engine.enqueue('queued', '/work/web');

      expect(engine.updateTaskStatus(pendingId, 'completed')).toBe(false);
      expect(engine.updateTaskStatus(pendingId, 'failed', 'cancelled')).toBe(true);
      expect(engine.pendingCount()).toBe(0);
    });

    it('should return false for an unknown task', () => {
      expect(engine.updateTaskStatus('missing', 'completed')).toBe(false);
    });

    it('should leave worker status to the worker', () => {
      engine.updateTaskStatus(taskId, 'completed');
      expect(registry.get('w1')?.status).toBe('busy');
    });
  });

  describe('getNextTaskForWorker', () => {
    it('should return the assigned task until the worker starts it', () => {
      registry.register(createRegistration('w1', '/work/web'));
      const taskId = engine.enqueue('npm test', '/work/web');

      expect(engine.getNextTaskForWorker('w1')?.id).toBe(taskId);

      engine.updateTaskStatus(taskId, 'in_progress');
      expect(engine.getNextTaskForWorker('w1')).toBeUndefined();
    });

    it('should return undefined for a worker without tasks', () => {
      expect(engine.getNextTaskForWorker('w9')).toBeUndefined();
    });
  });

  describe('events', () => {
    it('should deliver events after the operation has finished', () => {
      registry.register(createRegistration('w1', '/work/web'));
      const seen: Array<{ type: TaskEvent['type']; statusAtDelivery?: string }> = [];

      engine.on('taskEvent', (event: TaskEvent) => {
        seen.push({ type: event.type, statusAtDelivery: engine.getTask(event.task.id)?.status });
      });

      engine.enqueue('npm test', '/work/web');

      expect(seen).toEqual([
        { type: 'task_enqueued', statusAtDelivery: 'assigned' },
        { type: 'task_assigned', statusAtDelivery: 'assigned' },
      ]);
    });

    it('should report whether the assignment matched the context', () => {
      registry.register(createRegistration('w1', '/work/api'));
      const assigned: TaskEvent[] = [];
      engine.on('taskEvent', (event: TaskEvent) => {
        if (event.type === 'task_assigned') {
          assigned.push(event);
        }
      });

      engine.enqueue('npm test', '/work/web');

      expect(assigned).toHaveLength(1);
      expect(assigned[0]).toMatchObject({ type: 'task_assigned', affinity: false });
    });

    it('should log and continue when a listener throws', () => {
      engine.on('taskEvent', () => {
        throw new Error('listener broke');
      });

      expect(() => engine.enqueue('npm test', '')).not.toThrow();
      expect(logs.find((l) => l.event === 'task_event_listener_failed')).toMatchObject({
        level: 'error',
        type: 'task_enqueued',
        message: 'listener broke',
      });
    });

    it('should report the previous status on transitions', () => {
      registry.register(createRegistration('w1', '/work/web'));
      const taskId = engine.enqueue('npm test', '/work/web');
      const changes: TaskEvent[] = [];
      engine.on('taskEvent', (event: TaskEvent) => changes.push(event));

      engine.updateTaskStatus(taskId, 'in_progress');

      expect(changes).toHaveLength(1);
      expect(changes[0]).toMatchObject({
        type: 'task_status_changed',
        previousStatus: 'assigned',
        task: { id: taskId, status: 'in_progress' },
      });
    });
  });

  describe('restore', () => {
    it('should replace the queue with the given tasks', () => {
      engine.enqueue('discarded', '');
      const restored: Task = {
        id: 'task-restored',
        command: 'npm run lint',
        resourceContext: '/work/web',
        priority: 'high',
        status: 'pending',
        workerId: '',
        createdAt: new Date('2024-02-01T00:00:00Z'),
      };

      engine.restore([restored]);

      expect(engine.getTasks().map((t) => t.id)).toEqual(['task-restored']);

      registry.register(createRegistration('w1', '/work/web'));
      expect(engine.triggerAssignment()).toBe(1);
      expect(restored.status).toBe('pending');
    });
  });

  describe('getSnapshot', () => {
    it('should include workers and tasks', () => {
      registry.register(createRegistration('w1', '/work/web'));
      engine.enqueue('npm test', '/work/web');

      const snapshot = engine.getSnapshot();

      expect(snapshot.workers.map((w) => w.id)).toEqual(['w1']);
      expect(snapshot.tasks).toHaveLength(1);
      expect(snapshot.takenAt).toBeInstanceOf(Date);
    });
  });
});

describe('compareQueueOrder', () => {
  const createTask = (id: string, priority: Task['priority'], createdAt: string): Task => ({
    id,
    command: id,
    resourceContext: '',
    priority,
    status: 'pending',
    workerId: '',
    createdAt: new Date(createdAt),
  });

  it('should sort by priority then age', () => {
    const tasks = [
      createTask('normal-new', 'normal', '2024-01-02T00:00:00Z'),
      createTask('low', 'low', '2024-01-01T00:00:00Z'),
      createTask('high', 'high', '2024-01-03T00:00:00Z'),
      createTask('normal-old', 'normal', '2024-01-01T00:00:00Z'),
    ];

    expect(tasks.sort(compareQueueOrder).map((t) => t.id)).toEqual([
      'high',
      'normal-old',
      'normal-new',
      'low',
    ]);
  });
});
