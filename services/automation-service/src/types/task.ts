import type { ActionResult, Plan } from './action';

export type TaskStatus = 'pending' | 'interpreting' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<TaskStatus> = new Set(['completed', 'failed', 'cancelled']);

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface TaskError {
  kind: string;
  code: string;
  message: string;
  details?: unknown;
}

export interface Task {
  id: string;
  command: string;
  status: TaskStatus;
  plan: Plan | null;
  results: ActionResult[];
  require_confirmation: boolean;
  created_at: string;
  updated_at: string;
  started_at?: string;
  completed_at?: string;
  error?: TaskError;
}

/** Detached copy handed to callers; mutating it never touches the registry. */
export type TaskSnapshot = Readonly<Task>;

export interface TaskSummary {
  id: string;
  command: string;
  status: TaskStatus;
  actions: number;
  created_at: string;
  started_at?: string;
  completed_at?: string;
}

export interface CancelAck {
  task_id: string;
  status: TaskStatus;
  cancelled: boolean;
}
