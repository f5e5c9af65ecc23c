import type { Context } from 'hono';
import type { z } from 'zod';
import { AutopilotError, logger, TimeoutError, ValidationError } from '@autopilot/shared-utils';
import {
  ConfirmationNotFoundError,
  InterpretationError,
  ServiceUnavailableError,
  TaskNotFoundError,
} from '../errors';

export type ErrorStatus = 400 | 404 | 422 | 500 | 503 | 504;

export function statusFor(error: unknown): ErrorStatus {
  if (error instanceof TaskNotFoundError || error instanceof ConfirmationNotFoundError) {
    return 404;
  }
  if (error instanceof ValidationError) {
    return 400;
  }
  if (error instanceof InterpretationError) {
    return 422;
  }
  if (error instanceof TimeoutError) {
    return 504;
  }
  if (error instanceof ServiceUnavailableError) {
    return 503;
  }
  return 500;
}

export function errorResponse(c: Context, error: unknown, operation: string) {
  const status = statusFor(error);
  if (status >= 500) {
    logger.error(`Error ${operation}`, error);
  } else {
    logger.warn(`Rejected ${operation}`, error);
  }

  if (error instanceof AutopilotError) {
    return c.json(
      {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details === undefined ? {} : { details: error.details }),
        },
      },
      status
    );
  }
  return c.json({ success: false, error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } }, status);
}

/**
 * Parse and validate a JSON request body.
 *
 * @throws ValidationError when the body is not JSON or does not match
 */
export async function readBody<TSchema extends z.ZodTypeAny>(c: Context, schema: TSchema): Promise<z.infer<TSchema>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError('Request body must be valid JSON', 'automation-service');
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ValidationError(
      `Invalid request body: ${issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      'automation-service',
      { issues }
    );
  }
  return result.data;
}
