import { ConfigurationError, logger } from '@autopilot/shared-utils';
import type { AIConfig } from '../config/schema';
import type { AIBackend } from './types';
import { OpenAIProvider } from './providers/openai';
import { OllamaProvider } from './providers/ollama';
import { RuleBasedProvider } from './providers/rules';

export type { AIBackend, CompletionRequest, LLMMessage, LLMResponse } from './types';
export { OpenAIProvider, OllamaProvider, RuleBasedProvider };

export interface BackendSelection {
  backend: AIBackend;
  fallback?: AIBackend;
}

/**
 * Build the configured AI backend and, when enabled, the rule-based fallback.
 * An OpenAI backend without an API key degrades to the rules backend if
 * fallback is on.
 */
export function createBackends(config: AIConfig): BackendSelection {
  const rules = new RuleBasedProvider();
  const fallback = config.fallbackToRules ? rules : undefined;

  switch (config.backend) {
    case 'openai':
      if (!config.openai.apiKey) {
        if (!fallback) {
          throw new ConfigurationError('OPENAI_API_KEY is required for the openai backend', 'automation-service');
        }
        logger.warn('OPENAI_API_KEY not set, using the rule-based parser');
        return { backend: rules };
      }
      return {
        backend: new OpenAIProvider({
          apiKey: config.openai.apiKey,
          baseUrl: config.openai.baseUrl,
          model: config.openai.model,
          timeoutMs: config.timeoutMs,
        }),
        fallback,
      };
    case 'ollama':
      return {
        backend: new OllamaProvider({
          baseUrl: config.ollama.baseUrl,
          model: config.ollama.model,
          timeoutMs: config.timeoutMs,
        }),
        fallback,
      };
    case 'rules':
      return { backend: rules };
  }
}
