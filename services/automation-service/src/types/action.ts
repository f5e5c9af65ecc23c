import type { ActionAffinity } from '@autopilot/shared-types';

export type { ActionAffinity };

export const ACTION_KINDS = [
  'open_browser',
  'navigate',
  'search_web',
  'click',
  'fill_field',
  'close_browser',
  'open_app',
  'press_key',
  'hotkey',
  'type_text',
  'wait',
  'screenshot',
] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

export type ParameterValue = string | number | boolean;

export type ParameterType = 'string' | 'number' | 'boolean';

export interface ParameterSpec {
  type: ParameterType;
  required: boolean;
  description: string;
  min?: number;
  max?: number;
  // A list value is accepted and joined with this separator
  separator?: string;
}

export interface ActionDefinition {
  kind: ActionKind;
  affinity: ActionAffinity;
  description: string;
  parameters: Readonly<Record<string, ParameterSpec>>;
  // Failure invalidates every later action in the plan
  blocking: boolean;
  // Needs human approval when confirmation is required
  sensitive: boolean;
}

export interface Action {
  readonly kind: ActionKind;
  readonly parameters: Readonly<Record<string, ParameterValue>>;
  readonly description?: string;
}

/** Ordered, non-empty list of actions derived from one command. */
export type Plan = readonly Action[];

export type ActionStatus = 'succeeded' | 'failed' | 'skipped';

export interface ActionError {
  kind: string;
  code: string;
  message: string;
}

export interface ActionResult {
  readonly index: number;
  readonly kind: ActionKind;
  readonly status: ActionStatus;
  readonly started_at?: string;
  readonly completed_at: string;
  readonly duration_ms: number;
  readonly error?: ActionError;
  readonly output?: Readonly<Record<string, ParameterValue>>;
}
