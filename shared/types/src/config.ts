/**
 * Shared configuration primitives
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export const AI_BACKENDS = ['openai', 'ollama', 'rules'] as const;

export type AIBackendName = (typeof AI_BACKENDS)[number];

export type ActionAffinity = 'browser' | 'system';
