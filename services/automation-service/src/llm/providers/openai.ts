/**
 * OpenAI Provider
 * Chat Completions API through the official SDK.
 */

import OpenAI from 'openai';
import type { AIBackend, CompletionRequest, LLMMessage, LLMResponse } from '../types';

export interface OpenAIProviderOptions {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
}

/** The slice of the SDK client the provider calls; an `OpenAI` instance fits. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: OpenAI.Chat.ChatCompletionMessageParam[];
          max_tokens?: number;
          temperature?: number;
        },
        options?: { signal?: AbortSignal }
      ): PromiseLike<{
        model: string;
        choices: Array<{ message: { content: string | null } }>;
        usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
      }>;
    };
  };
}

export class OpenAIProvider implements AIBackend {
  readonly name = 'openai';
  private client: ChatCompletionsClient;
  private defaultModel: string;

  constructor(options: OpenAIProviderOptions, client?: ChatCompletionsClient) {
    this.defaultModel = options.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        // the interpreter owns retries through its fallback path
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest): Promise<LLMResponse> {
    const response = await this.client.chat.completions.create(
      {
        model: this.defaultModel,
        messages: this.convertMessages(request.messages),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      },
      { signal: request.signal }
    );

    const choice = response.choices?.[0];
    if (!choice) {
      throw new Error('OpenAI response missing choices');
    }

    return {
      content: choice.message.content || '',
      usage: {
        promptTokens: response.usage?.prompt_tokens || 0,
        completionTokens: response.usage?.completion_tokens || 0,
        totalTokens: response.usage?.total_tokens || 0,
      },
      model: response.model,
    };
  }

  private convertMessages(messages: LLMMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((message): OpenAI.Chat.ChatCompletionMessageParam => {
      switch (message.role) {
        case 'system':
          return { role: 'system', content: message.content };
        case 'assistant':
          return { role: 'assistant', content: message.content };
        case 'user':
          return { role: 'user', content: message.content };
      }
    });
  }
}
