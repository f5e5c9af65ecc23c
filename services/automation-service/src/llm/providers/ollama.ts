/**
 * Ollama Provider
 * Local models (Llama 3.2, Mistral, ...) through Ollama's chat endpoint.
 */

import { z } from 'zod';
import { TimeoutError } from '@autopilot/shared-utils';
import type { AIBackend, CompletionRequest, LLMResponse } from '../types';

export interface OllamaProviderOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

const OllamaChatResponseSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  model: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export class OllamaProvider implements AIBackend {
  readonly name = 'ollama';
  private baseUrl: string;
  private defaultModel: string;
  private timeoutMs: number;

  constructor(options: OllamaProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.defaultModel = options.model;
    this.timeoutMs = options.timeoutMs;
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.defaultModel,
          messages: request.messages,
          options: {
            temperature: request.temperature,
            num_predict: request.maxTokens,
          },
          stream: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`Ollama API error: ${response.status} ${await response.text()}`);
      }

      const parsed = OllamaChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Ollama API returned an unexpected response body');
      }
      const data = parsed.data;
      const promptTokens = data.prompt_eval_count || 0;
      const completionTokens = data.eval_count || 0;

      return {
        content: data.message?.content ?? '',
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: promptTokens + completionTokens,
        },
        model: data.model || this.defaultModel,
      };
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError('ollama.chat', 'ollama', this.timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener('abort', forwardAbort);
    }
  }
}
