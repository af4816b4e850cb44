/**
 * Unit tests for WorkerRegistry
 */

import { WorkerRegistry } from './worker-registry';
import { WorkerRegistration } from '../interfaces/types';

describe('WorkerRegistry', () => {
  let registry: WorkerRegistry;

  const createRegistration = (
    id: string,
    overrides: Partial<WorkerRegistration> = {}
  ): WorkerRegistration => ({
    id,
    resourceContext: '/work/web',
    ...overrides,
  });

  beforeEach(() => {
    registry = new WorkerRegistry();
  });

  describe('register', () => {
    it('should register a new worker with defaults', () => {
      expect(registry.register(createRegistration('worker-1'))).toBe(true);

      const worker = registry.get('worker-1');
      expect(registry.size()).toBe(1);
      expect(worker?.name).toBe('worker-1');
      expect(worker?.kind).toBe('generic');
      expect(worker?.status).toBe('idle');
      expect(worker?.lastActivity).toBeInstanceOf(Date);
      expect(worker?.currentTaskRef).toBeUndefined();
    });

    it('should replace an existing worker on re-registration', () => {
      registry.register(createRegistration('worker-1', { resourceContext: '/work/web' }));
      registry.register(createRegistration('worker-1', { resourceContext: '/work/api', status: 'busy' }));

      expect(registry.size()).toBe(1);
      expect(registry.get('worker-1')?.resourceContext).toBe('/work/api');
      expect(registry.get('worker-1')?.status).toBe('busy');
    });

    it('should keep a supplied last activity time', () => {
      const lastActivity = new Date('2024-01-02T03:04:05Z');
      registry.register(createRegistration('worker-1', { lastActivity }));

      expect(registry.get('worker-1')?.lastActivity.toISOString()).toBe('2024-01-02T03:04:05.000Z');
    });

    it('should reject an empty id', () => {
      expect(registry.register(createRegistration('   '))).toBe(false);
      expect(registry.size()).toBe(0);
    });

    it('should trim the id', () => {
      registry.register(createRegistration('  worker-1 '));
      expect(registry.get('worker-1')?.id).toBe('worker-1');
    });
  });

  describe('get', () => {
    it('should return undefined for an unknown worker', () => {
      expect(registry.get('missing')).toBeUndefined();
    });

    it('should return a copy that does not affect the registry', () => {
      registry.register(createRegistration('worker-1'));
      const copy = registry.get('worker-1');
      if (copy) {
        copy.status = 'offline';
      }

      expect(registry.get('worker-1')?.status).toBe('idle');
    });
  });

  describe('updateStatus', () => {
    it('should update status, task reference and activity time', () => {
      const lastActivity = new Date('2020-01-01T00:00:00Z');
      registry.register(createRegistration('worker-1', { lastActivity }));

      expect(registry.updateStatus('worker-1', 'busy', 'task-9')).toBe(true);

      const worker = registry.get('worker-1');
      expect(worker?.status).toBe('busy');
      expect(worker?.currentTaskRef).toBe('task-9');
      expect(worker?.lastActivity.getTime()).toBeGreaterThan(lastActivity.getTime());
    });

    it('should keep the previous task reference when none is given', () => {
      registry.register(createRegistration('worker-1', { currentTaskRef: 'task-1' }));

      registry.updateStatus('worker-1', 'idle');
      expect(registry.get('worker-1')?.currentTaskRef).toBe('task-1');

      registry.updateStatus('worker-1', 'idle', '');
      expect(registry.get('worker-1')?.currentTaskRef).toBe('task-1');
    });

    it('should return false for an unknown worker', () => {
      expect(registry.updateStatus('missing', 'busy')).toBe(false);
    });
  });

  describe('findAvailable', () => {
    beforeEach(() => {
      registry.register(createRegistration('idle-web', { resourceContext: 'C:\\work\\web' }));
      registry.register(createRegistration('busy-web', { resourceContext: 'c:/work/web/', status: 'busy' }));
      registry.register(createRegistration('error-web', { resourceContext: 'c:/work/web', status: 'error' }));
      registry.register(createRegistration('idle-api', { resourceContext: 'c:/work/api' }));
      registry.register(createRegistration('offline-api', { resourceContext: 'c:/work/api', status: 'offline' }));
    });

    it('should return idle and busy workers when no context is given', () => {
      const ids = registry.findAvailable().map((w) => w.id);
      expect(ids).toEqual(['idle-web', 'busy-web', 'idle-api']);
    });

    it('should filter by normalized context', () => {
      const ids = registry.findAvailable('C:/Work/Web').map((w) => w.id);
      expect(ids).toEqual(['idle-web', 'busy-web']);
    });

    it('should find a worker registered with a trailing backslash', () => {
      registry.register(createRegistration('repo-worker', { resourceContext: 'C:\\repo\\' }));
      expect(registry.findAvailable('c:/repo').map((w) => w.id)).toEqual(['repo-worker']);
    });

    it('should treat a blank context as no filter', () => {
      expect(registry.findAvailable('   ')).toHaveLength(3);
    });
  });

  describe('replaceAll', () => {
    it('should replace every worker with the new set', () => {
      registry.register(createRegistration('old-1'));
      registry.register(createRegistration('old-2'));

      const count = registry.replaceAll([
        createRegistration('new-1'),
        createRegistration(''),
        createRegistration('new-2', { status: 'busy' }),
      ]);

      expect(count).toBe(2);
      expect(registry.getAll().map((w) => w.id)).toEqual(['new-1', 'new-2']);
      expect(registry.get('old-1')).toBeUndefined();
    });

    it('should empty the registry when given no workers', () => {
      registry.register(createRegistration('worker-1'));
      expect(registry.replaceAll([])).toBe(0);
      expect(registry.size()).toBe(0);
    });
  });

  describe('clearAll', () => {
    it('should remove all workers', () => {
      registry.register(createRegistration('worker-1'));
      registry.register(createRegistration('worker-2'));

      registry.clearAll();

      expect(registry.size()).toBe(0);
      expect(registry.getAll()).toEqual([]);
    });
  });
});
