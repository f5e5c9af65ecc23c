import { v4 as uuidv4 } from 'uuid';
import { logger as rootLogger, type EventBus } from '@autopilot/shared-utils';
import type { Action } from '../types/action';
import type { AutomationEvent } from '../types/events';

const logger = rootLogger.child('confirmation');

export interface ConfirmationRequest {
  taskId: string;
  actionIndex: number;
  action: Action;
}

export interface PendingConfirmation {
  id: string;
  task_id: string;
  action_index: number;
  action: Action;
  requested_at: string;
  expires_at: string;
}

interface Waiter {
  confirmation: PendingConfirmation;
  settle: (approved: boolean) => void;
}

/**
 * Holds sensitive actions until an operator approves or denies them.
 * Anything other than an explicit approval (denial, expiry, abort) counts
 * as a denial.
 */
export class ConfirmationGate {
  private pending = new Map<string, Waiter>();
  private events: EventBus<AutomationEvent>;

  constructor(events: EventBus<AutomationEvent>) {
    this.events = events;
  }

  request(request: ConfirmationRequest, options: { timeoutMs: number; signal?: AbortSignal }): Promise<boolean> {
    if (options.signal?.aborted) {
      return Promise.resolve(false);
    }

    const now = new Date();
    const confirmation: PendingConfirmation = {
      id: uuidv4(),
      task_id: request.taskId,
      action_index: request.actionIndex,
      action: request.action,
      requested_at: now.toISOString(),
      expires_at: new Date(now.getTime() + options.timeoutMs).toISOString(),
    };

    return new Promise<boolean>(resolve => {
      const onAbort = () => settle(false);
      const timer = setTimeout(() => {
        logger.warn(`Confirmation ${confirmation.id} expired`, { taskId: request.taskId });
        settle(false);
      }, options.timeoutMs);

      const settle = (approved: boolean) => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        this.pending.delete(confirmation.id);
        resolve(approved);
      };

      options.signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.set(confirmation.id, { confirmation, settle });

      logger.info(`Awaiting confirmation ${confirmation.id} for ${request.action.kind}`, {
        taskId: request.taskId,
        actionIndex: request.actionIndex,
      });
      this.events.publish({
        type: 'confirmation_required',
        task_id: request.taskId,
        confirmation_id: confirmation.id,
        action_index: request.actionIndex,
        action: request.action,
        expires_at: confirmation.expires_at,
        timestamp: confirmation.requested_at,
      });
    });
  }

  /** Returns false when `id` is not pending. */
  resolve(id: string, approved: boolean): boolean {
    const waiter = this.pending.get(id);
    if (!waiter) {
      return false;
    }
    logger.info(`Confirmation ${id} ${approved ? 'approved' : 'denied'}`);
    waiter.settle(approved);
    return true;
  }

  approve(id: string): boolean {
    return this.resolve(id, true);
  }

  deny(id: string): boolean {
    return this.resolve(id, false);
  }

  get(id: string): PendingConfirmation | undefined {
    return this.pending.get(id)?.confirmation;
  }

  listPending(): PendingConfirmation[] {
    return [...this.pending.values()].map(w => w.confirmation);
  }

  /** Denies everything still pending. */
  clear(): void {
    for (const waiter of [...this.pending.values()]) {
      waiter.settle(false);
    }
  }
}
