import { logger as rootLogger } from '@autopilot/shared-utils';
import { isTerminal, type Task } from '../types/task';

const logger = rootLogger.child('tasks');

export interface TaskStoreOptions {
  /** Most tasks kept; only finished tasks are evicted to stay under it */
  capacity: number;
  /** Finished tasks older than this (by completion time) are dropped */
  maxAgeMs: number;
  now?: () => number;
}

/**
 * In-memory task registry. Active tasks are never evicted, so the store can
 * exceed `capacity` while many tasks run at once.
 */
export class TaskStore {
  private tasks = new Map<string, Task>();
  private capacity: number;
  private maxAgeMs: number;
  private now: () => number;

  constructor(options: TaskStoreOptions) {
    this.capacity = options.capacity;
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? Date.now;
  }

  add(task: Task): void {
    this.tasks.set(task.id, task);
    this.evict();
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  has(id: string): boolean {
    return this.tasks.has(id);
  }

  /** Insertion order, oldest first. */
  values(): Task[] {
    return [...this.tasks.values()];
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Drop expired finished tasks, then the oldest finished tasks until the
   * store fits its capacity. Returns the evicted ids.
   */
  evict(): string[] {
    const evicted: string[] = [];
    const cutoff = this.now() - this.maxAgeMs;

    for (const task of this.tasks.values()) {
      if (isTerminal(task.status) && Date.parse(task.completed_at ?? task.updated_at) < cutoff) {
        evicted.push(task.id);
      }
    }
    evicted.forEach(id => this.tasks.delete(id));

    if (this.tasks.size > this.capacity) {
      const finished = [...this.tasks.values()]
        .filter(task => isTerminal(task.status))
        .sort((a, b) => Date.parse(a.completed_at ?? a.updated_at) - Date.parse(b.completed_at ?? b.updated_at));
      for (const task of finished) {
        if (this.tasks.size <= this.capacity) {
          break;
        }
        this.tasks.delete(task.id);
        evicted.push(task.id);
      }
    }

    if (evicted.length > 0) {
      logger.debug(`Evicted ${evicted.length} finished task(s)`);
    }
    return evicted;
  }

  clear(): void {
    this.tasks.clear();
  }
}
