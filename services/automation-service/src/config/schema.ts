/**
 * Service configuration schema, checked once at startup.
 */

import { z } from 'zod';
import { AI_BACKENDS, LOG_LEVELS } from '@autopilot/shared-types';

export const OpenAIConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1),
  baseUrl: z.string().url().optional(),
});

export const OllamaConfigSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
});

export const AIConfigSchema = z.object({
  backend: z.enum(AI_BACKENDS),
  // only on backend errors, never on a malformed answer
  fallbackToRules: z.boolean(),
  timeoutMs: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
  openai: OpenAIConfigSchema,
  ollama: OllamaConfigSchema,
});

export const ExecutionConfigSchema = z.object({
  actionTimeoutMs: z.number().int().positive(),
  requireConfirmation: z.boolean(),
  confirmationTimeoutMs: z.number().int().positive(),
  enableSystemControl: z.boolean(),
  headlessBrowser: z.boolean(),
  browserChannel: z.string().min(1).optional(),
  screenshotDir: z.string().min(1),
});

export const TasksConfigSchema = z.object({
  historyLimit: z.number().int().positive(),
  maxAgeMs: z.number().int().positive(),
  historyContextSize: z.number().int().nonnegative(),
});

export const ServerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

export const AppConfigSchema = z.object({
  ai: AIConfigSchema,
  execution: ExecutionConfigSchema,
  tasks: TasksConfigSchema,
  server: ServerConfigSchema,
  logLevel: z.enum(LOG_LEVELS),
});

export type AIConfig = z.infer<typeof AIConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
