import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@autopilot/shared-utils';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config.ai).toMatchObject({
      backend: 'openai',
      fallbackToRules: true,
      timeoutMs: 30_000,
      openai: { model: 'gpt-4o-mini' },
      ollama: { baseUrl: 'http://localhost:11434', model: 'llama3.2' },
    });
    expect(config.ai.openai.apiKey).toBeUndefined();
    expect(config.execution).toMatchObject({
      actionTimeoutMs: 30_000,
      requireConfirmation: false,
      enableSystemControl: true,
      headlessBrowser: false,
      screenshotDir: path.join(os.tmpdir(), 'autopilot-screenshots'),
    });
    expect(config.tasks).toEqual({ historyLimit: 200, maxAgeMs: 3_600_000, historyContextSize: 3 });
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8000 });
    expect(config.logLevel).toBe('info');
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      AI_BACKEND: 'Ollama',
      OPENAI_API_KEY: 'test-secret',
      REQUIRE_CONFIRMATION: 'true',
      HEADLESS_BROWSER: 'true',
      PORT: '9001',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.ai.backend).toBe('ollama');
    expect(config.ai.openai.apiKey).toBe('test-secret');
    expect(config.execution.requireConfirmation).toBe(true);
    expect(config.execution.headlessBrowser).toBe(true);
    expect(config.server.port).toBe(9001);
    expect(config.logLevel).toBe('debug');
  });

  it('should list every invalid setting', () => {
    const load = () => loadConfig({ AI_BACKEND: 'gemini', PORT: '70000' });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow(/ai\.backend: .*; server\.port: /);
  });

  it('should reject values that are not numbers', () => {
    expect(() => loadConfig({ ACTION_TIMEOUT_MS: 'soon' })).toThrow(
      'Environment variable ACTION_TIMEOUT_MS must be a valid number'
    );
  });
});
