/**
 * Periodic task scheduler
 * Runs each named task on its own timer. A run is bounded by a timeout and a
 * tick is skipped while the previous run of the same task is still active.
 */

import { EventEmitter } from 'events';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';

export interface ScheduledTaskDefinition {
  id: string;
  interval: number; // milliseconds
  timeout?: number; // milliseconds, defaults to the interval
  runImmediately?: boolean;
  run: () => Promise<void>;
}

interface SchedulerTask extends ScheduledTaskDefinition {
  nextExecution: Date;
}

export interface SchedulerOptions {
  defaultTimeout?: number;
}

export interface TaskErrorEvent {
  taskId: string;
  error: unknown;
}

export class MonitoringScheduler extends EventEmitter {
  private tasks: Map<string, SchedulerTask> = new Map();
  private timers: Map<string, NodeJS.Timeout> = new Map();
  private activeTasks = new Set<string>();
  private isRunning = false;
  private options: Required<SchedulerOptions>;

  constructor(options: SchedulerOptions = {}) {
    super();
    this.options = {
      defaultTimeout: options.defaultTimeout ?? 0
    };
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.isRunning) {
      logger.warn('MonitoringScheduler is already running');
      return;
    }

    this.isRunning = true;
    logger.info(`Starting scheduler with ${this.tasks.size} task(s)`);

    for (const task of this.tasks.values()) {
      this.scheduleTask(task, task.runImmediately ? 0 : task.interval);
    }
  }

  /**
   * Stop the scheduler. Runs in progress are abandoned.
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping scheduler');
    this.isRunning = false;

    for (const [taskId, timer] of this.timers) {
      clearTimeout(timer);
      logger.debug(`Cleared timer for task: ${taskId}`);
    }
    this.timers.clear();
    this.activeTasks.clear();
  }

  addTask(definition: ScheduledTaskDefinition): void {
    if (this.tasks.has(definition.id)) {
      this.removeTask(definition.id);
    }

    const task: SchedulerTask = {
      ...definition,
      nextExecution: new Date(Date.now() + definition.interval)
    };
    this.tasks.set(task.id, task);

    if (this.isRunning) {
      this.scheduleTask(task, task.runImmediately ? 0 : task.interval);
    }
  }

  removeTask(taskId: string): void {
    const timer = this.timers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(taskId);
    }

    this.tasks.delete(taskId);
    this.activeTasks.delete(taskId);
    logger.debug(`Removed task: ${taskId}`);
  }

  /**
   * Change a task's interval. The next run is rescheduled from now.
   */
  updateInterval(taskId: string, interval: number): void {
    const task = this.tasks.get(taskId);
    if (!task || task.interval === interval) {
      return;
    }

    logger.info(`Task ${taskId} interval changed from ${task.interval}ms to ${interval}ms`);
    task.interval = interval;

    if (this.isRunning && !this.activeTasks.has(taskId)) {
      this.scheduleTask(task, interval);
    }
  }

  getInterval(taskId: string): number | undefined {
    return this.tasks.get(taskId)?.interval;
  }

  isTaskActive(taskId: string): boolean {
    return this.activeTasks.has(taskId);
  }

  /**
   * Get current scheduler status
   */
  getStatus(): {
    running: boolean;
    totalTasks: number;
    activeTasks: number;
    tasks: Array<{ id: string; interval: number; nextExecution: Date; active: boolean }>;
  } {
    return {
      running: this.isRunning,
      totalTasks: this.tasks.size,
      activeTasks: this.activeTasks.size,
      tasks: Array.from(this.tasks.values()).map(task => ({
        id: task.id,
        interval: task.interval,
        nextExecution: task.nextExecution,
        active: this.activeTasks.has(task.id)
      }))
    };
  }

  private scheduleTask(task: SchedulerTask, delay: number): void {
    const existingTimer = this.timers.get(task.id);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    task.nextExecution = new Date(Date.now() + delay);
    logger.debug(`Scheduling task ${task.id} in ${delay}ms`);

    const timer = setTimeout(() => {
      void this.executeTask(task);
    }, delay);

    this.timers.set(task.id, timer);
  }

  private async executeTask(task: SchedulerTask): Promise<void> {
    if (!this.isRunning || this.tasks.get(task.id) !== task) {
      return;
    }

    // The next tick is scheduled before the run so a slow run cannot stall the cadence
    this.scheduleTask(task, task.interval);

    if (this.activeTasks.has(task.id)) {
      logger.warn(`Skipping task ${task.id} - previous run still in progress`);
      this.emit('task:skipped', { taskId: task.id });
      return;
    }

    this.activeTasks.add(task.id);
    const timeout = task.timeout ?? (this.options.defaultTimeout || task.interval);

    try {
      logger.debug(`Executing task: ${task.id}`);
      await withTimeout(task.run(), timeout, `Task ${task.id}`, 'MonitoringScheduler');
      this.emit('task:complete', { taskId: task.id });
    } catch (error) {
      logger.error(`Error executing task ${task.id}:`, error);
      const event: TaskErrorEvent = { taskId: task.id, error };
      this.emit('task:error', event);
    } finally {
      this.activeTasks.delete(task.id);
    }
  }
}
