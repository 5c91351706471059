import { v4 as uuidv4 } from 'uuid';
import type { PipelineOutcome, PipelineState, TaskStatus, TaskUpdate } from '../types';
import { env } from '../env';

/**
 * Task Manager - tracks each search run's state, progress and outcome
 */
export class TaskManager {
  private tasks: Map<string, TaskStatus> = new Map();
  private outcomes: Map<string, PipelineOutcome> = new Map();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly ttlMs: number = env.TASK_TTL_MS) {
    this.startCleanup();
  }

  /**
   * Create a new task
   */
  createTask(): string {
    const id = uuidv4();

    const task: TaskStatus = {
      id,
      state: 'idle',
      finished: false,
      progress: 0,
      message: 'Initializing...',
      papersFound: 0,
      downloadsAttempted: 0,
      lastUpdate: new Date()
    };

    this.tasks.set(id, task);
    return id;
  }

  /**
   * Get a task by ID
   */
  getTask(taskId: string): TaskStatus | undefined {
    return this.tasks.get(taskId);
  }

  getOutcome(taskId: string): PipelineOutcome | undefined {
    return this.outcomes.get(taskId);
  }

  /**
   * Update a task's status
   */
  updateTask(taskId: string, updates: TaskUpdate): void {
    const task = this.tasks.get(taskId);
    if (!task) return;

    Object.assign(task, updates, { lastUpdate: new Date() });
  }

  /**
   * Record a pipeline transition
   */
  transition(taskId: string, state: PipelineState, updates: TaskUpdate = {}): void {
    this.updateTask(taskId, { ...updates, state });
  }

  /**
   * Store the outcome and hand the task back to idle, or to error
   */
  finishTask(taskId: string, outcome: PipelineOutcome): void {
    this.outcomes.set(taskId, outcome);

    switch (outcome.kind) {
      case 'invalid':
      case 'search-failed':
        this.failTask(taskId, outcome.error);
        return;
      case 'no-results':
        this.updateTask(taskId, {
          state: 'idle',
          finished: true,
          progress: 100,
          message: outcome.message
        });
        return;
      case 'complete':
        this.updateTask(taskId, {
          state: 'idle',
          finished: true,
          progress: 100,
          message: outcome.summary.text,
          csvUrl: `/api/download/${taskId}/csv`,
          zipUrl: outcome.summary.downloaded > 0 ? `/api/download/${taskId}/zip` : undefined
        });
        return;
    }
  }

  /**
   * Mark task as failed
   */
  failTask(taskId: string, error: string): void {
    this.updateTask(taskId, {
      state: 'error',
      finished: true,
      error,
      message: error
    });
  }

  /**
   * Delete a task
   */
  deleteTask(taskId: string): boolean {
    this.outcomes.delete(taskId);
    return this.tasks.delete(taskId);
  }

  /**
   * Clean up old tasks
   */
  cleanupOldTasks(now: number = Date.now()): number {
    let cleaned = 0;

    for (const [id, task] of this.tasks) {
      const age = now - task.lastUpdate.getTime();
      if (age > this.ttlMs) {
        this.deleteTask(id);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      console.log(`Cleaned up ${cleaned} old tasks`);
    }

    return cleaned;
  }

  /**
   * Start automatic cleanup
   */
  private startCleanup(): void {
    // Run cleanup every 10 minutes
    const timer = setInterval(() => {
      this.cleanupOldTasks();
    }, 10 * 60 * 1000);
    // Pending cleanup must not keep the process alive
    timer.unref();
    this.cleanupInterval = timer;
  }

  /**
   * Stop cleanup interval
   */
  stopCleanup(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  /**
   * Get task count
   */
  get taskCount(): number {
    return this.tasks.size;
  }
}

// Singleton instance
export const taskManager = new TaskManager();
