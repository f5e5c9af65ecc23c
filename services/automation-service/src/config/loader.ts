import os from 'node:os';
import path from 'node:path';
import {
  ConfigurationError,
  getEnv,
  getEnvBoolean,
  getEnvNumber,
  getEnvOptional,
  type EnvSource,
} from '@autopilot/shared-utils';
import { AppConfigSchema, type AppConfig } from './schema';

/**
 * Read the service configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const raw = {
    ai: {
      backend: getEnv('AI_BACKEND', 'openai', env).toLowerCase(),
      fallbackToRules: getEnvBoolean('AI_FALLBACK_TO_RULES', true, env),
      timeoutMs: getEnvNumber('AI_TIMEOUT_MS', 30_000, env),
      temperature: getEnvNumber('AI_TEMPERATURE', 0.3, env),
      maxTokens: getEnvNumber('AI_MAX_TOKENS', 1000, env),
      openai: {
        apiKey: getEnvOptional('OPENAI_API_KEY', env),
        model: getEnv('OPENAI_MODEL', 'gpt-4o-mini', env),
        baseUrl: getEnvOptional('OPENAI_BASE_URL', env),
      },
      ollama: {
        baseUrl: getEnv('OLLAMA_BASE_URL', 'http://localhost:11434', env),
        model: getEnv('OLLAMA_MODEL', 'llama3.2', env),
      },
    },
    execution: {
      actionTimeoutMs: getEnvNumber('ACTION_TIMEOUT_MS', 30_000, env),
      requireConfirmation: getEnvBoolean('REQUIRE_CONFIRMATION', false, env),
      confirmationTimeoutMs: getEnvNumber('CONFIRMATION_TIMEOUT_MS', 60_000, env),
      enableSystemControl: getEnvBoolean('ENABLE_SYSTEM_CONTROL', true, env),
      headlessBrowser: getEnvBoolean('HEADLESS_BROWSER', false, env),
      browserChannel: getEnvOptional('BROWSER_CHANNEL', env),
      screenshotDir: getEnv('SCREENSHOT_DIR', path.join(os.tmpdir(), 'autopilot-screenshots'), env),
    },
    tasks: {
      historyLimit: getEnvNumber('TASK_HISTORY_LIMIT', 200, env),
      maxAgeMs: getEnvNumber('TASK_MAX_AGE_MS', 3_600_000, env),
      historyContextSize: getEnvNumber('HISTORY_CONTEXT_SIZE', 3, env),
    },
    server: {
      host: getEnv('HOST', '0.0.0.0', env),
      port: getEnvNumber('PORT', 8000, env),
    },
    logLevel: getEnv('LOG_LEVEL', 'info', env).toLowerCase(),
  };

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid configuration: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      'automation-service',
      { issues }
    );
  }
  return result.data;
}
