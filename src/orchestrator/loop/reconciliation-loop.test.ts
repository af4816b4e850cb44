/**
 * Unit tests for ReconciliationLoop
 */

import { ReconciliationLoop, CycleResult, abortableSleep } from './reconciliation-loop';
import { AssignmentEngine } from '../engine/assignment-engine';
import { WorkerRegistry } from '../registry/worker-registry';
import { StructuredLogger } from '../metrics/logger';

const silentLogger = (): StructuredLogger => new StructuredLogger({ output: () => undefined });

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('ReconciliationLoop', () => {
  let registry: WorkerRegistry;
  let engine: AssignmentEngine;
  let loop: ReconciliationLoop;

  beforeEach(() => {
    registry = new WorkerRegistry();
    engine = new AssignmentEngine(registry, silentLogger());
    loop = new ReconciliationLoop(engine, { intervalMs: 10, errorBackoffMs: 1000 }, silentLogger());
  });

  afterEach(async () => {
    await loop.stop();
  });

  describe('processCycle', () => {
    it('should do nothing without waiting tasks', () => {
      registry.register({ id: 'w1', resourceContext: '/work/web' });

      expect(loop.processCycle()).toEqual({
        unassigned: 0,
        available: 1,
        assigned: 0,
        triggered: false,
      });
    });

    it('should not sweep when no worker is idle', () => {
      engine.enqueue('one', '/work/web');
      engine.enqueue('two', '/work/web');

      expect(loop.processCycle()).toEqual({
        unassigned: 2,
        available: 0,
        assigned: 0,
        triggered: false,
      });
    });

    it('should assign waiting tasks to workers that became idle', () => {
      engine.enqueue('one', '/work/web');
      engine.enqueue('two', '/work/web');
      engine.enqueue('three', '/work/api');
      registry.register({ id: 'w1', resourceContext: '/work/web' });
      registry.register({ id: 'w2', resourceContext: '/work/api' });

      expect(loop.processCycle()).toEqual({
        unassigned: 3,
        available: 2,
        assigned: 2,
        triggered: true,
      });
      expect(engine.pendingCount()).toBe(1);
    });
  });

  describe('start / stop', () => {
    it('should run the first cycle immediately', async () => {
      const firstCycle = new Promise<CycleResult>((resolve) => loop.once('cycle', resolve));

      expect(loop.start()).toBe(true);
      expect(loop.getState()).toBe('running');

      const result = await firstCycle;
      expect(result.triggered).toBe(false);
    });

    it('should refuse a second start', () => {
      expect(loop.start()).toBe(true);
      expect(loop.start()).toBe(false);
    });

    it('should not restart after stop', async () => {
      loop.start();
      await loop.stop();

      expect(loop.getState()).toBe('stopped');
      expect(loop.start()).toBe(false);
    });

    it('should treat stop before start as final', async () => {
      await loop.stop();

      expect(loop.getState()).toBe('stopped');
      expect(loop.start()).toBe(false);
    });

    it('should assign a task queued before any worker existed', async () => {
      const taskId = engine.enqueue('npm test', '/work/web');
      const assignedCycle = new Promise<CycleResult>((resolve) => {
        loop.on('cycle', (result: CycleResult) => {
          if (result.assigned > 0) {
            resolve(result);
          }
        });
      });

      loop.start();
      await sleep(25);
      registry.register({ id: 'w1', resourceContext: '/work/web' });

      const result = await assignedCycle;
      expect(result.assigned).toBe(1);
      expect(engine.getTask(taskId)?.workerId).toBe('w1');
    });
  });

  describe('error handling', () => {
    it('should emit cycleError and back off after a failing cycle', async () => {
      jest.spyOn(engine, 'getSnapshot').mockImplementationOnce(() => {
        throw new Error('snapshot failed');
      });

      let cycles = 0;
      loop.on('cycle', () => {
        cycles++;
      });
      const failure = new Promise<Error>((resolve) => loop.once('cycleError', resolve));

      loop.start();
      const err = await failure;
      expect(err.message).toBe('snapshot failed');

      await sleep(100);
      expect(cycles).toBe(0);

      const stopStarted = Date.now();
      await loop.stop();
      expect(Date.now() - stopStarted).toBeLessThan(500);
    });
  });
});

describe('abortableSleep', () => {
  it('should resolve at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const started = Date.now();
    await abortableSleep(10000, controller.signal);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should resolve early when aborted mid-sleep', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = abortableSleep(10000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1000);
  });
});
