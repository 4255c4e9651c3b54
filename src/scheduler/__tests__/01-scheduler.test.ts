/**
 * Scheduler Tests
 */

import { Scheduler } from '../scheduler';

function silentLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('Scheduler', () => {
  let scheduler: Scheduler;
  let logger: ReturnType<typeof silentLogger>;

  beforeEach(() => {
    logger = silentLogger();
    scheduler = new Scheduler({ logger });
  });

  afterEach(async () => {
    await scheduler.stop();
  });

  describe('registration', () => {
    it('should register and unregister tasks', () => {
      scheduler.registerTask({ id: 'a', name: 'A', interval: 1000, handler: async () => {}, enabled: true });

      expect(scheduler.hasTask('a')).toBe(true);
      expect(scheduler.unregisterTask('a')).toBe(true);
      expect(scheduler.hasTask('a')).toBe(false);
      expect(scheduler.unregisterTask('a')).toBe(false);
    });

    it('should reject duplicate ids', () => {
      scheduler.registerTask({ id: 'a', name: 'A', interval: 1000, handler: async () => {}, enabled: true });

      expect(() =>
        scheduler.registerTask({ id: 'a', name: 'A', interval: 1000, handler: async () => {}, enabled: true })
      ).toThrow('Task already registered: a');
    });
  });

  describe('runTask()', () => {
    it('should count runs and failures', async () => {
      const error = new Error('nope');
      let fail = false;
      scheduler.registerTask({
        id: 'a',
        name: 'A',
        interval: 60 * 60 * 1000,
        handler: async () => {
          if (fail) throw error;
        },
        enabled: true,
      });

      await scheduler.runTask('a');
      fail = true;
      await scheduler.runTask('a');

      const [task] = scheduler.getStatus();
      expect(task.runs).toBe(1);
      expect(task.failures).toBe(1);
      expect(task.lastRun).toBeInstanceOf(Date);
      expect(logger.error).toHaveBeenCalledWith('[Scheduler] Task A failed:', error);
    });

    it('should join a run already in flight', async () => {
      let release: () => void = () => {};
      const handler = jest.fn(() => new Promise<void>(resolve => { release = resolve; }));
      scheduler.registerTask({ id: 'a', name: 'A', interval: 60 * 60 * 1000, handler, enabled: true });

      const first = scheduler.runTask('a');
      const second = scheduler.runTask('a');
      release();
      await Promise.all([first, second]);

      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('periodic runs', () => {
    it('should run enabled tasks on their interval once started', async () => {
      const handler = jest.fn(async () => {});
      scheduler.registerTask({ id: 'a', name: 'A', interval: 10, handler, enabled: true });

      scheduler.start();
      await new Promise(resolve => setTimeout(resolve, 55));

      expect(handler.mock.calls.length).toBeGreaterThanOrEqual(2);
      expect(logger.log).toHaveBeenCalledWith('[Scheduler] Started with 1 tasks');
    });

    it('should not run disabled tasks', async () => {
      const handler = jest.fn(async () => {});
      scheduler.registerTask({ id: 'a', name: 'A', interval: 10, handler, enabled: false });

      scheduler.start();
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(handler).not.toHaveBeenCalled();
    });

    it('should stop re-arming after stop()', async () => {
      const handler = jest.fn(async () => {});
      scheduler.registerTask({ id: 'a', name: 'A', interval: 10, handler, enabled: true });

      scheduler.start();
      await scheduler.stop();
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(handler).not.toHaveBeenCalled();
      expect(scheduler.started).toBe(false);
    });
  });
});
