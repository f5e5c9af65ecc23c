/**
 * AI backend contract used by the command interpreter.
 */

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Aborts the outbound call; providers must honor it */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

/**
 * A text-in, text-out model endpoint. Remote APIs, local models and the
 * keyword parser all implement it.
 */
export interface AIBackend {
  /** Provider name (e.g. 'openai', 'ollama', 'rules') */
  readonly name: string;

  complete(request: CompletionRequest): Promise<LLMResponse>;
}

/**
 * Text of the last user message, which carries the command being interpreted.
 */
export function lastUserMessage(messages: LLMMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      return messages[i].content;
    }
  }
  return '';
}
