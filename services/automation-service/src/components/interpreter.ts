import { logger as rootLogger, TimeoutError, withTimeout } from '@autopilot/shared-utils';
import type { Action, Plan } from '../types/action';
import type { AIBackend, LLMMessage } from '../llm/types';
import { describeActionSchema } from './action-schema';
import { validatePlanEntries } from './plan-validator';
import { AIBackendError, MalformedOutputError, NoActionableIntentError } from '../errors';

const logger = rootLogger.child('interpreter');

/** Earlier exchanges passed back to the model as conversation turns. */
export interface InterpretationContext {
  history?: Array<{ command: string; plan: Plan }>;
}

export interface CommandInterpreterOptions {
  backend: AIBackend;
  /** Asked when `backend` throws (not when its answer is malformed) */
  fallback?: AIBackend;
  timeoutMs: number;
  temperature?: number;
  maxTokens?: number;
}

/** Keys an object-shaped answer may wrap its action array in. */
const WRAPPER_KEYS = ['actions', 'plan', 'steps'] as const;

export function buildSystemPrompt(): string {
  return [
    'You are an automation parser. Convert the user command into a JSON array of actions.',
    '',
    'Available actions (name(parameters): purpose, "?" marks optional parameters):',
    describeActionSchema(),
    '',
    'Each array element is {"kind": <action name>, "parameters": {...}, "description": <short text>}.',
    'Use only the listed actions and parameters. If the command asks for nothing you can do, return [].',
    'Return ONLY the JSON array, no markdown and no commentary.',
    '',
    'Example for "open chrome and go to youtube.com":',
    '[{"kind": "open_browser", "parameters": {}}, {"kind": "navigate", "parameters": {"url": "youtube.com"}}]',
  ].join('\n');
}

export function buildMessages(command: string, context?: InterpretationContext): LLMMessage[] {
  const messages: LLMMessage[] = [{ role: 'system', content: buildSystemPrompt() }];

  for (const turn of context?.history ?? []) {
    messages.push({ role: 'user', content: turn.command });
    messages.push({ role: 'assistant', content: JSON.stringify(turn.plan) });
  }

  messages.push({ role: 'user', content: command });
  return messages;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function unwrap(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) {
    return value;
  }
  if (isRecord(value)) {
    for (const key of WRAPPER_KEYS) {
      const inner = value[key];
      if (Array.isArray(inner)) {
        return inner;
      }
    }
    // a single action object
    if (typeof value.kind === 'string' || typeof value.action === 'string') {
      return [value];
    }
  }
  return undefined;
}

/**
 * Pull the action array out of a model answer. Accepts a bare array, fenced
 * code, an object wrapping the array, or an array embedded in prose.
 */
export function extractPlanPayload(content: string): unknown[] {
  const trimmed = content.trim();
  if (!trimmed) {
    throw new MalformedOutputError('AI backend returned an empty response');
  }

  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const candidates = [fenced?.[1]?.trim(), trimmed];

  const start = trimmed.indexOf('[');
  const end = trimmed.lastIndexOf(']');
  if (start !== -1 && end > start) {
    candidates.push(trimmed.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    if (!candidate) {
      continue;
    }
    const parsed = tryParse(candidate);
    if (!parsed.ok) {
      continue;
    }
    const entries = unwrap(parsed.value);
    if (entries) {
      return entries;
    }
  }

  throw new MalformedOutputError('AI backend response does not contain a JSON action array', {
    preview: trimmed.slice(0, 200),
  });
}

/**
 * Turns a natural-language command into a validated {@link Plan}.
 *
 * The only side effect is the outbound backend call. Nothing reaches the
 * engine unless every entry passed schema validation.
 */
export class CommandInterpreter {
  private options: CommandInterpreterOptions;

  constructor(options: CommandInterpreterOptions) {
    this.options = options;
  }

  get backendName(): string {
    return this.options.backend.name;
  }

  async interpret(command: string, context?: InterpretationContext, signal?: AbortSignal): Promise<Plan> {
    const text = command.trim();
    if (!text) {
      throw new NoActionableIntentError(command);
    }

    const messages = buildMessages(text, context);
    const content = await this.complete(messages, signal);
    const entries = extractPlanPayload(content);
    const actions: Action[] = validatePlanEntries(entries);

    if (actions.length === 0) {
      throw new NoActionableIntentError(text);
    }

    logger.info(`Interpreted command into ${actions.length} action(s)`, {
      kinds: actions.map(a => a.kind),
    });
    return Object.freeze(actions);
  }

  private async complete(messages: LLMMessage[], signal?: AbortSignal): Promise<string> {
    const { backend, fallback } = this.options;

    let primaryError: unknown;
    try {
      return await this.ask(backend, messages, signal);
    } catch (error) {
      primaryError = error;
    }

    if (!fallback || fallback === backend || signal?.aborted) {
      throw primaryError instanceof TimeoutError ? primaryError : new AIBackendError(backend.name, primaryError);
    }
    logger.warn(`Backend ${backend.name} failed, falling back to ${fallback.name}`, primaryError);

    try {
      return await this.ask(fallback, messages, signal);
    } catch (error) {
      throw error instanceof TimeoutError ? error : new AIBackendError(fallback.name, error);
    }
  }

  private async ask(backend: AIBackend, messages: LLMMessage[], signal?: AbortSignal): Promise<string> {
    const { timeoutMs, temperature, maxTokens } = this.options;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await withTimeout(
        backend.complete({ messages, temperature, maxTokens, signal: controller.signal }),
        timeoutMs,
        `${backend.name}.complete`,
        'interpreter'
      );
      logger.debug(`${backend.name} answered`, { model: response.model, usage: response.usage });
      return response.content;
    } finally {
      // stops a call still running after a timeout
      controller.abort();
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
