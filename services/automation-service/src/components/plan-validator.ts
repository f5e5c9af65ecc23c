import { z } from 'zod';
import type { Action, ParameterSpec, ParameterValue } from '../types/action';
import { getActionDefinition, isActionKind } from './action-schema';
import { InvalidParametersError, UnknownActionError, type PlanViolation } from '../errors';

/**
 * Shape of one entry as the AI backend writes it. `action`/`params` are the
 * aliases older prompts used for `kind`/`parameters`.
 */
const RawEntrySchema = z.object({
  kind: z.string().optional(),
  action: z.string().optional(),
  parameters: z.record(z.unknown()).nullable().optional(),
  params: z.record(z.unknown()).nullable().optional(),
  description: z.string().optional(),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// zod rebuilds records and drops keys such as __proto__, so names come from the raw object
function givenParameterNames(raw: unknown): string[] {
  if (!isRecord(raw)) {
    return [];
  }
  const given = raw.parameters ?? raw.params;
  return isRecord(given) ? Object.keys(given) : [];
}

type Coerced = { ok: true; value: ParameterValue } | { ok: false; reason: string };

function coerce(value: unknown, spec: ParameterSpec): Coerced {
  switch (spec.type) {
    case 'string': {
      if (spec.separator && Array.isArray(value) && value.length > 0 && value.every(v => typeof v === 'string')) {
        return { ok: true, value: value.join(spec.separator) };
      }
      if (typeof value === 'string') {
        return value.trim() === '' ? { ok: false, reason: 'must not be empty' } : { ok: true, value };
      }
      if (typeof value === 'number' || typeof value === 'boolean') {
        return { ok: true, value: String(value) };
      }
      return { ok: false, reason: 'must be a string' };
    }

    case 'number': {
      const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
      if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
        return { ok: false, reason: 'must be a number' };
      }
      if (spec.min !== undefined && parsed < spec.min) {
        return { ok: false, reason: `must be at least ${spec.min}` };
      }
      if (spec.max !== undefined && parsed > spec.max) {
        return { ok: false, reason: `must be at most ${spec.max}` };
      }
      return { ok: true, value: parsed };
    }

    case 'boolean': {
      if (typeof value === 'boolean') {
        return { ok: true, value };
      }
      if (value === 'true' || value === 'false') {
        return { ok: true, value: value === 'true' };
      }
      return { ok: false, reason: 'must be a boolean' };
    }
  }
}

function validateEntry(raw: unknown, index: number, violations: PlanViolation[]): Action | undefined {
  const parsed = RawEntrySchema.safeParse(raw);
  if (!parsed.success) {
    violations.push({
      index,
      kind: 'unknown',
      problem: 'invalid_entry',
      message: `entry ${index} must be an object with a kind and parameters`,
    });
    return undefined;
  }

  const entry = parsed.data;
  const kind = (entry.kind ?? entry.action ?? '').trim();

  if (!isActionKind(kind)) {
    violations.push({
      index,
      kind: kind || 'missing',
      problem: 'unknown_kind',
      message: kind ? `entry ${index} has unknown kind "${kind}"` : `entry ${index} has no kind`,
    });
    return undefined;
  }

  const definition = getActionDefinition(kind);
  const given = entry.parameters ?? entry.params ?? {};
  const parameters: Record<string, ParameterValue> = {};
  const before = violations.length;

  for (const name of givenParameterNames(raw)) {
    if (!Object.hasOwn(definition.parameters, name)) {
      violations.push({
        index,
        kind,
        problem: 'unknown_parameter',
        parameter: name,
        message: `${kind}[${index}] does not accept parameter "${name}"`,
      });
    }
  }

  for (const [name, spec] of Object.entries(definition.parameters)) {
    const value = Object.hasOwn(given, name) ? given[name] : undefined;
    if (value === undefined || value === null) {
      if (spec.required) {
        violations.push({
          index,
          kind,
          problem: 'missing_parameter',
          parameter: name,
          message: `${kind}[${index}] is missing required parameter "${name}"`,
        });
      }
      continue;
    }

    const result = coerce(value, spec);
    if (result.ok) {
      parameters[name] = result.value;
    } else {
      violations.push({
        index,
        kind,
        problem: 'invalid_parameter',
        parameter: name,
        message: `${kind}[${index}] parameter "${name}" ${result.reason}`,
      });
    }
  }

  if (violations.length > before) {
    return undefined;
  }

  const description = entry.description?.trim();
  return Object.freeze({
    kind,
    parameters: Object.freeze(parameters),
    ...(description ? { description } : {}),
  });
}

/**
 * Validate raw plan entries against the action schema.
 *
 * Checks every entry before failing. Throws {@link UnknownActionError} when any
 * entry names an unknown kind, otherwise {@link InvalidParametersError} when any
 * parameter is missing, unexpected or of the wrong type. Both carry the full
 * violation list. An empty input yields an empty list; callers decide whether
 * that is an error.
 */
export function validatePlanEntries(entries: readonly unknown[]): Action[] {
  const violations: PlanViolation[] = [];
  const actions: Action[] = [];

  entries.forEach((raw, index) => {
    const action = validateEntry(raw, index, violations);
    if (action) {
      actions.push(action);
    }
  });

  if (violations.length === 0) {
    return actions;
  }

  if (violations.some(v => v.problem === 'unknown_kind')) {
    throw new UnknownActionError(violations);
  }
  throw new InvalidParametersError(violations);
}
