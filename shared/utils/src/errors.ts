export interface ServiceError {
  code: string;
  message: string;
  service: string;
  timestamp: string;
  details?: unknown;
}

/**
 * Base error for every failure the services raise on purpose.
 * `code` is stable and machine-readable; `service` names the origin.
 */
export class AutopilotError extends Error {
  code: string;
  service: string;
  timestamp: string;
  details?: unknown;

  constructor(message: string, code: string, service: string, details?: unknown) {
    super(message);
    this.name = 'AutopilotError';
    this.code = code;
    this.service = service;
    this.timestamp = new Date().toISOString();
    this.details = details;
  }

  toJSON(): ServiceError {
    return {
      code: this.code,
      message: this.message,
      service: this.service,
      timestamp: this.timestamp,
      details: this.details,
    };
  }
}

export class ValidationError extends AutopilotError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', service, details);
    this.name = 'ValidationError';
  }
}

export class TimeoutError extends AutopilotError {
  constructor(operation: string, service: string, timeoutMs: number) {
    super(`Operation ${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT_ERROR', service, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

export class ConfigurationError extends AutopilotError {
  constructor(message: string, service: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', service, details);
    this.name = 'ConfigurationError';
  }
}

export function isAutopilotError(error: unknown): error is AutopilotError {
  return error instanceof AutopilotError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : JSON.stringify(error);
}
