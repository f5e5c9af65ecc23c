import type { Action, ActionResult } from './action';
import type { TaskError, TaskStatus } from './task';

interface BaseEvent {
  task_id: string;
  timestamp: string;
}

export interface TaskCreatedEvent extends BaseEvent {
  type: 'task_created';
  command: string;
}

export interface TaskStatusChangedEvent extends BaseEvent {
  type: 'task_status_changed';
  from: TaskStatus;
  to: TaskStatus;
}

export interface ActionStartedEvent extends BaseEvent {
  type: 'action_started';
  index: number;
  action: Action;
}

export interface ActionCompletedEvent extends BaseEvent {
  type: 'action_completed';
  result: ActionResult;
}

export interface ConfirmationRequiredEvent extends BaseEvent {
  type: 'confirmation_required';
  confirmation_id: string;
  action_index: number;
  action: Action;
  expires_at: string;
}

export interface TaskFinishedEvent extends BaseEvent {
  type: 'task_finished';
  status: TaskStatus;
  error?: TaskError;
}

export type AutomationEvent =
  | TaskCreatedEvent
  | TaskStatusChangedEvent
  | ActionStartedEvent
  | ActionCompletedEvent
  | ConfirmationRequiredEvent
  | TaskFinishedEvent;
