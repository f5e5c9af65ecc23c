import { AutopilotError, errorMessage } from '@autopilot/shared-utils';
import type { TaskError } from './types/task';

const SERVICE = 'automation-service';

export type InterpretationFailure =
  | 'malformed_output'
  | 'unknown_action'
  | 'invalid_parameters'
  | 'no_actionable_intent';

export interface PlanViolation {
  index: number;
  kind: string;
  problem: 'unknown_kind' | 'missing_parameter' | 'unknown_parameter' | 'invalid_parameter' | 'invalid_entry';
  parameter?: string;
  message: string;
}

/**
 * The AI backend's answer could not be turned into a valid plan.
 */
export class InterpretationError extends AutopilotError {
  readonly reason: InterpretationFailure;

  constructor(message: string, reason: InterpretationFailure, code: string, details?: unknown) {
    super(message, code, SERVICE, details);
    this.name = 'InterpretationError';
    this.reason = reason;
  }
}

export class MalformedOutputError extends InterpretationError {
  constructor(message: string, details?: unknown) {
    super(message, 'malformed_output', 'MALFORMED_OUTPUT', details);
    this.name = 'MalformedOutputError';
  }
}

export class UnknownActionError extends InterpretationError {
  readonly violations: PlanViolation[];

  constructor(violations: PlanViolation[]) {
    const kinds = [...new Set(violations.filter(v => v.problem === 'unknown_kind').map(v => v.kind))];
    super(
      `Plan contains unknown action kind(s): ${kinds.join(', ')} (${violations.length} violation(s) total)`,
      'unknown_action',
      'UNKNOWN_ACTION',
      { violations }
    );
    this.name = 'UnknownActionError';
    this.violations = violations;
  }
}

export class InvalidParametersError extends InterpretationError {
  readonly violations: PlanViolation[];

  constructor(violations: PlanViolation[]) {
    super(
      `Plan has ${violations.length} invalid parameter(s): ${violations.map(v => v.message).join('; ')}`,
      'invalid_parameters',
      'INVALID_PARAMETERS',
      { violations }
    );
    this.name = 'InvalidParametersError';
    this.violations = violations;
  }
}

export class NoActionableIntentError extends InterpretationError {
  constructor(command: string) {
    super(`No actionable intent found in command: "${command}"`, 'no_actionable_intent', 'NO_ACTIONABLE_INTENT', {
      command,
    });
    this.name = 'NoActionableIntentError';
  }
}

export class AIBackendError extends AutopilotError {
  constructor(backend: string, cause: unknown) {
    super(`AI backend ${backend} failed: ${errorMessage(cause)}`, 'AI_BACKEND_ERROR', SERVICE, { backend });
    this.name = 'AIBackendError';
  }
}

export class DriverError extends AutopilotError {
  constructor(driver: 'browser' | 'system', cause: string, details?: unknown) {
    super(cause, 'DRIVER_ERROR', `${driver}-driver`, details);
    this.name = 'DriverError';
  }
}

export class TaskNotFoundError extends AutopilotError {
  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', SERVICE, { taskId });
    this.name = 'TaskNotFoundError';
  }
}

export class CancellationError extends AutopilotError {
  constructor(taskId: string) {
    super(`Task ${taskId} was cancelled`, 'TASK_CANCELLED', SERVICE, { taskId });
    this.name = 'CancellationError';
  }
}

export class ConfirmationNotFoundError extends AutopilotError {
  constructor(confirmationId: string) {
    super(`No pending confirmation: ${confirmationId}`, 'CONFIRMATION_NOT_FOUND', SERVICE, { confirmationId });
    this.name = 'ConfirmationNotFoundError';
  }
}

export class ServiceUnavailableError extends AutopilotError {
  constructor(message: string) {
    super(message, 'SERVICE_UNAVAILABLE', SERVICE);
    this.name = 'ServiceUnavailableError';
  }
}

/** A sensitive action was denied by the operator or its confirmation expired. */
export class ConfirmationDeniedError extends AutopilotError {
  constructor(actionIndex: number, kind: string) {
    super(`Confirmation for action ${actionIndex} (${kind}) was denied or expired`, 'CONFIRMATION_DENIED', SERVICE, {
      actionIndex,
    });
    this.name = 'ConfirmationDeniedError';
  }
}

/** Not attempted because an earlier blocking action failed. */
export class BlockedActionError extends AutopilotError {
  constructor(blockingIndex: number, blockingKind: string) {
    super(`Skipped after blocking action ${blockingIndex} (${blockingKind}) failed`, 'BLOCKED_BY_FAILURE', SERVICE, {
      blockingIndex,
    });
    this.name = 'BlockedActionError';
  }
}

/**
 * Record form of any thrown value, as stored on a task or action result.
 */
export function toTaskError(error: unknown): TaskError {
  if (error instanceof AutopilotError) {
    return {
      kind: error.name,
      code: error.code,
      message: error.message,
      ...(error.details === undefined ? {} : { details: error.details }),
    };
  }
  if (error instanceof Error) {
    return { kind: error.name, code: 'INTERNAL_ERROR', message: error.message };
  }
  return { kind: 'Error', code: 'INTERNAL_ERROR', message: errorMessage(error) };
}
