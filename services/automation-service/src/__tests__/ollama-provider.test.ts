import { afterEach, describe, it, expect, vi } from 'vitest';
import { TimeoutError } from '@autopilot/shared-utils';
import { OllamaProvider } from '../llm/providers/ollama';

describe('OllamaProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post a non-streaming chat request and map the reply', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      Response.json({
        model: 'llama3.2',
        message: { role: 'assistant', content: '[]' },
        prompt_eval_count: 40,
        eval_count: 2,
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434/', model: 'llama3.2', timeoutMs: 1000 });
    const response = await provider.complete({
      messages: [{ role: 'user', content: 'open chrome' }],
      temperature: 0.3,
      maxTokens: 200,
    });

    expect(response).toEqual({
      content: '[]',
      model: 'llama3.2',
      usage: { promptTokens: 40, completionTokens: 2, totalTokens: 42 },
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3.2',
      messages: [{ role: 'user', content: 'open chrome' }],
      options: { temperature: 0.3, num_predict: 200 },
      stream: false,
    });
  });

  it('should report HTTP errors with the status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('model not found', { status: 404 }))
    );
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', model: 'missing', timeoutMs: 1000 });

    await expect(provider.complete({ messages: [{ role: 'user', content: 'hi' }] })).rejects.toThrow(
      'Ollama API error: 404 model not found'
    );
  });

  it('should abort and raise TimeoutError when the server is too slow', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      )
    );
    const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434', model: 'llama3.2', timeoutMs: 20 });

    const error = await provider.complete({ messages: [{ role: 'user', content: 'hi' }] }).catch(e => e);
    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('Operation ollama.chat timed out after 20ms');
  });
});
