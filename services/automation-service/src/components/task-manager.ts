import { v4 as uuidv4 } from 'uuid';
import { logger as rootLogger, type EventBus } from '@autopilot/shared-utils';
import type { Action, ActionResult, Plan } from '../types/action';
import type { AutomationEvent } from '../types/events';
import type { CancelAck, Task, TaskError, TaskSnapshot, TaskStatus, TaskSummary } from '../types/task';
import { isTerminal } from '../types/task';
import { CancellationError, ServiceUnavailableError, TaskNotFoundError, toTaskError } from '../errors';
import type { AutomationEngine } from './engine';
import type { CommandInterpreter, InterpretationContext } from './interpreter';
import type { ConfirmationGate } from './confirmation-gate';
import { isBlocking } from './action-schema';
import { RunQueue, type RunSlot } from './run-queue';
import type { TaskStore } from './task-store';

const logger = rootLogger.child('tasks');

export type PlanInterpreter = Pick<CommandInterpreter, 'interpret'>;
export type PlanExecutor = Pick<AutomationEngine, 'execute' | 'cleanup' | 'idle'>;

export interface TaskManagerOptions {
  interpreter: PlanInterpreter;
  engine: PlanExecutor;
  events: EventBus<AutomationEvent>;
  store: TaskStore;
  gate?: ConfirmationGate;
  queue?: RunQueue;
  requireConfirmation: boolean;
  /** Finished tasks replayed to the interpreter as earlier turns */
  historyContextSize: number;
}

export interface SubmitOptions {
  requireConfirmation?: boolean;
  context?: InterpretationContext;
}

/**
 * Owns task lifecycles: interpretation runs as soon as a command arrives,
 * execution waits for the task's place in the run queue so that two plans
 * never drive the same browser or desktop at once.
 */
export class TaskManager {
  private options: TaskManagerOptions;
  private queue: RunQueue;
  private controllers = new Map<string, AbortController>();
  private running = new Map<string, Promise<TaskSnapshot>>();
  private started = false;

  constructor(options: TaskManagerOptions) {
    this.options = options;
    this.queue = options.queue ?? new RunQueue();
  }

  start(): void {
    this.started = true;
    logger.info('Task manager started');
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    logger.info(`Stopping task manager, cancelling ${this.controllers.size} active task(s)`);

    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.options.gate?.clear();
    await Promise.allSettled([...this.running.values()]);

    try {
      await this.options.engine.cleanup();
    } catch (error) {
      logger.error('Engine cleanup failed', error);
    }
    this.options.store.clear();
    logger.info('Task manager stopped');
  }

  get isRunning(): boolean {
    return this.started;
  }

  /**
   * Register a command and start processing it. Returns the task id right
   * away; the task finishes in the background.
   */
  submit(command: string, options: SubmitOptions = {}): string {
    if (!this.started) {
      throw new ServiceUnavailableError('Task manager is not running');
    }

    const now = new Date().toISOString();
    const task: Task = {
      id: uuidv4(),
      command,
      status: 'pending',
      plan: null,
      results: [],
      require_confirmation: options.requireConfirmation ?? this.options.requireConfirmation,
      created_at: now,
      updated_at: now,
    };

    const context = options.context ?? this.historyContext();
    const slot = this.queue.reserve();
    const controller = new AbortController();

    this.options.store.add(task);
    this.controllers.set(task.id, controller);
    logger.info(`Task ${task.id} created`, { command, queuePosition: slot.position });
    this.publish({ type: 'task_created', task_id: task.id, command, timestamp: now });

    this.running.set(task.id, this.run(task, slot, controller.signal, context));
    return task.id;
  }

  get(taskId: string): TaskSnapshot {
    return structuredClone(this.require(taskId));
  }

  /** Newest first. */
  list(): TaskSummary[] {
    return this.options.store
      .values()
      .reverse()
      .map(task => ({
        id: task.id,
        command: task.command,
        status: task.status,
        actions: task.plan?.length ?? 0,
        created_at: task.created_at,
        ...(task.started_at ? { started_at: task.started_at } : {}),
        ...(task.completed_at ? { completed_at: task.completed_at } : {}),
      }));
  }

  /**
   * Request cooperative cancellation. The task stops before its next action;
   * an action already running is allowed to finish.
   */
  cancel(taskId: string): CancelAck {
    const task = this.require(taskId);
    const controller = this.controllers.get(taskId);

    if (isTerminal(task.status) || !controller) {
      return { task_id: taskId, status: task.status, cancelled: false };
    }

    controller.abort();
    logger.info(`Cancellation requested for task ${taskId}`, { status: task.status });
    return { task_id: taskId, status: task.status, cancelled: true };
  }

  /** Resolves with the task's final snapshot. */
  async waitFor(taskId: string): Promise<TaskSnapshot> {
    const pending = this.running.get(taskId);
    if (pending) {
      return pending;
    }
    return this.get(taskId);
  }

  private async run(
    task: Task,
    slot: RunSlot,
    signal: AbortSignal,
    context: InterpretationContext
  ): Promise<TaskSnapshot> {
    let executed = false;
    try {
      this.transition(task, 'interpreting');
      let plan: Plan;
      try {
        plan = await this.options.interpreter.interpret(task.command, context, signal);
      } catch (error) {
        return signal.aborted ? this.cancelled(task) : this.finish(task, 'failed', toTaskError(error));
      }

      task.plan = plan;
      this.touch(task);
      if (signal.aborted || !(await this.waitForTurn(slot, signal))) {
        return this.cancelled(task);
      }

      task.started_at = new Date().toISOString();
      this.transition(task, 'running');
      executed = true;

      const results = await this.options.engine.execute(plan, {
        taskId: task.id,
        signal,
        requireConfirmation: task.require_confirmation,
        onActionStart: (index, action) => this.actionStarted(task, index, action),
        onActionResult: result => this.actionCompleted(task, result),
      });

      // a cancel that arrived during the last action stopped nothing
      if (results.some(result => result.status === 'skipped' && result.error?.code === 'TASK_CANCELLED')) {
        return this.cancelled(task);
      }
      const blocking = results.find(result => result.status === 'failed' && isBlocking(result.kind));
      if (blocking?.error) {
        return this.finish(task, 'failed', { ...blocking.error, details: { action_index: blocking.index } });
      }
      return this.finish(task, 'completed');
    } catch (error) {
      logger.error(`Task ${task.id} crashed`, error);
      return this.finish(task, 'failed', toTaskError(error));
    } finally {
      if (executed) {
        // the next plan starts only when no driver call of this one is in flight
        await this.options.engine.idle();
      }
      slot.release();
      this.controllers.delete(task.id);
      this.running.delete(task.id);
    }
  }

  private waitForTurn(slot: RunSlot, signal: AbortSignal): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      const onAbort = () => resolve(false);
      signal.addEventListener('abort', onAbort, { once: true });
      slot.acquire().then(
        () => {
          signal.removeEventListener('abort', onAbort);
          resolve(!signal.aborted);
        },
        reject
      );
    });
  }

  private actionStarted(task: Task, index: number, action: Action): void {
    this.publish({
      type: 'action_started',
      task_id: task.id,
      index,
      action,
      timestamp: new Date().toISOString(),
    });
  }

  private actionCompleted(task: Task, result: ActionResult): void {
    task.results.push(result);
    this.touch(task);
    this.publish({ type: 'action_completed', task_id: task.id, result, timestamp: task.updated_at });
  }

  private cancelled(task: Task): TaskSnapshot {
    return this.finish(task, 'cancelled', toTaskError(new CancellationError(task.id)));
  }

  private finish(task: Task, status: TaskStatus, error?: TaskError): TaskSnapshot {
    if (error) {
      task.error = error;
    }
    task.completed_at = new Date().toISOString();
    this.transition(task, status);

    if (status === 'completed') {
      logger.info(`Task ${task.id} completed`, { actions: task.results.length });
    } else {
      logger.warn(`Task ${task.id} ${status}`, { error: error?.message });
    }
    this.publish({
      type: 'task_finished',
      task_id: task.id,
      status,
      ...(error ? { error } : {}),
      timestamp: task.completed_at,
    });
    return structuredClone(task);
  }

  private transition(task: Task, to: TaskStatus): void {
    const from = task.status;
    task.status = to;
    this.touch(task);
    logger.debug(`Task ${task.id}: ${from} -> ${to}`);
    this.publish({ type: 'task_status_changed', task_id: task.id, from, to, timestamp: task.updated_at });
  }

  private touch(task: Task): void {
    task.updated_at = new Date().toISOString();
  }

  private historyContext(): InterpretationContext {
    const size = this.options.historyContextSize;
    if (size <= 0) {
      return {};
    }
    const history = this.options.store
      .values()
      .filter((task): task is Task & { plan: Plan } => task.status === 'completed' && task.plan !== null)
      .slice(-size)
      .map(task => ({ command: task.command, plan: task.plan }));
    return { history };
  }

  private require(taskId: string): Task {
    const task = this.options.store.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private publish(event: AutomationEvent): void {
    this.options.events.publish(event);
  }
}
