/**
 * Simple periodic scheduler
 * Each task is re-armed only after its previous run finishes, so runs of the
 * same task never overlap.
 */

import type { ProfileLogger } from '../profile-store/types';

export interface ScheduledTask {
  id: string;
  name: string;
  /** Milliseconds between the end of one run and the start of the next */
  interval: number;
  handler: () => Promise<void>;
  enabled: boolean;
  lastRun?: Date;
  nextRun?: Date;
  runs: number;
  failures: number;
}

export type TaskRegistration = Omit<ScheduledTask, 'lastRun' | 'nextRun' | 'runs' | 'failures'>;

export class Scheduler {
  private tasks: Map<string, ScheduledTask> = new Map();
  private timers: Map<string, NodeJS.Timeout> = new Map();
  private running: Map<string, Promise<void>> = new Map();
  private isRunning = false;
  private logger: ProfileLogger;

  constructor(options: { logger?: ProfileLogger } = {}) {
    this.logger = options.logger ?? console;
  }

  get started(): boolean {
    return this.isRunning;
  }

  /**
   * Register a task; scheduled at once if the scheduler is running
   */
  registerTask(task: TaskRegistration): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Task already registered: ${task.id}`);
    }

    this.tasks.set(task.id, {
      ...task,
      runs: 0,
      failures: 0,
      nextRun: this.calculateNextRun(task.interval),
    });

    if (this.isRunning && task.enabled) {
      this.scheduleTask(task.id);
    }
  }

  /**
   * Remove a task and cancel its timer. An in-flight run is left to finish.
   */
  unregisterTask(taskId: string): boolean {
    this.clearTimer(taskId);
    return this.tasks.delete(taskId);
  }

  hasTask(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    for (const [id, task] of this.tasks.entries()) {
      if (task.enabled) {
        this.scheduleTask(id);
      }
    }

    this.logger.log(`[Scheduler] Started with ${this.tasks.size} tasks`);
  }

  /**
   * Stop scheduling and wait for in-flight runs
   */
  async stop(): Promise<void> {
    this.isRunning = false;

    for (const taskId of Array.from(this.timers.keys())) {
      this.clearTimer(taskId);
    }

    await Promise.all(this.running.values());
  }

  /**
   * Run a task now, outside its schedule. Joins an in-flight run.
   */
  async runTask(taskId: string): Promise<void> {
    const inFlight = this.running.get(taskId);
    if (inFlight) {
      return inFlight;
    }

    const run = this.executeTask(taskId).finally(() => {
      this.running.delete(taskId);
    });
    this.running.set(taskId, run);
    return run;
  }

  getStatus(): ScheduledTask[] {
    return Array.from(this.tasks.values()).map(task => ({ ...task }));
  }

  toggleTask(taskId: string, enabled: boolean): void {
    const task = this.tasks.get(taskId);
    if (!task) return;

    task.enabled = enabled;

    if (enabled && this.isRunning) {
      this.scheduleTask(taskId);
    } else {
      this.clearTimer(taskId);
    }
  }

  private scheduleTask(taskId: string): void {
    const task = this.tasks.get(taskId);
    if (!task || !task.enabled) return;

    this.clearTimer(taskId);

    const timer = setTimeout(() => {
      this.timers.delete(taskId);
      this.runTask(taskId)
        .then(() => {
          if (this.isRunning && this.tasks.has(taskId)) {
            this.scheduleTask(taskId);
          }
        })
        .catch(error => {
          this.logger.error(`[Scheduler] Task ${taskId} could not be rescheduled:`, error);
        });
    }, task.interval);

    // Don't keep the event loop alive
    timer.unref?.();
    this.timers.set(taskId, timer);
    task.nextRun = this.calculateNextRun(task.interval);
  }

  private async executeTask(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId);
    if (!task) return;

    try {
      await task.handler();
      task.runs++;
    } catch (error) {
      task.failures++;
      this.logger.error(`[Scheduler] Task ${task.name} failed:`, error);
    } finally {
      task.lastRun = new Date();
    }
  }

  private clearTimer(taskId: string): void {
    const timer = this.timers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(taskId);
    }
  }

  private calculateNextRun(interval: number): Date {
    return new Date(Date.now() + interval);
  }
}
