import { describe, it, expect } from 'vitest';

import { ConfigError } from '../core/errors.js';
import { createLLMClient, createRoleClients, loadLLMConfig } from './index.js';

describe('loadLLMConfig', () => {
  it('should default to anthropic with deterministic sampling', () => {
    const config = loadLLMConfig({});
    expect(config.provider).toBe('anthropic');
    expect(config.apiKey).toBeUndefined();
    expect(config.model).toBeUndefined();
    expect(config.maxTokens).toBe(4096);
    expect(config.temperature).toBe(0);
  });

  it('should read the key variable of the chosen provider', () => {
    const config = loadLLMConfig({
      LLM_PROVIDER: 'openai',
      ANTHROPIC_API_KEY: 'wrong-secret',
      OPENAI_API_KEY: 'test-secret',
    });
    expect(config.provider).toBe('openai');
    expect(config.apiKey).toBe('test-secret');
  });

  it('should prefer REDLOOP_MODEL over LLM_MODEL', () => {
    expect(loadLLMConfig({ REDLOOP_MODEL: 'model-a', LLM_MODEL: 'model-b' }).model).toBe('model-a');
    expect(loadLLMConfig({ REDLOOP_MODEL: ' ', LLM_MODEL: 'model-b' }).model).toBe('model-b');
  });

  it('should ignore keys for the mock provider', () => {
    const config = loadLLMConfig({ LLM_PROVIDER: 'mock', ANTHROPIC_API_KEY: 'test-secret' });
    expect(config.apiKey).toBeUndefined();
  });

  it('should read per-role model overrides', () => {
    const config = loadLLMConfig({ PLANNER_MODEL: 'model-large', EXTRACTOR_MODEL: ' ' });
    expect(config.roleModels?.planner).toBe('model-large');
    expect(config.roleModels?.interpreter).toBeUndefined();
    expect(config.roleModels?.extractor).toBeUndefined();
  });

  it('should reject an unknown provider', () => {
    expect(() => loadLLMConfig({ LLM_PROVIDER: 'local' })).toThrow(
      new ConfigError('LLM_PROVIDER must be one of: anthropic, openai, mock'),
    );
  });

  it('should reject an out-of-range temperature', () => {
    expect(() => loadLLMConfig({ LLM_TEMPERATURE: '3' })).toThrow(ConfigError);
    expect(() => loadLLMConfig({ LLM_TEMPERATURE: '3' })).toThrow(/^Invalid LLM settings: LLM_TEMPERATURE: /);
  });
});

describe('createLLMClient', () => {
  it('should require an API key for hosted providers', () => {
    expect(() => createLLMClient({ provider: 'openai', maxTokens: 1024, temperature: 0 })).toThrow(
      'OPENAI_API_KEY is required when LLM_PROVIDER=openai',
    );
  });

  it('should build the mock provider without a key', async () => {
    const client = createLLMClient({ provider: 'mock', maxTokens: 1024, temperature: 0 });
    await expect(client.generate('system', 'user')).resolves.toBe('{"result":"mock"}');
  });

  it('should build a hosted client without calling out', () => {
    const client = createLLMClient({
      provider: 'anthropic',
      apiKey: 'test-secret',
      maxTokens: 1024,
      temperature: 0,
    });
    expect(typeof client.generate).toBe('function');
  });
});

describe('createRoleClients', () => {
  it('should share one client when no role has its own model', () => {
    const clients = createRoleClients({ provider: 'mock', maxTokens: 1024, temperature: 0 });
    expect(clients.planner).toBe(clients.interpreter);
    expect(clients.summarizer).toBe(clients.extractor);
    expect(clients.planner).toBe(clients.extractor);
  });

  it('should build a separate client for a role with its own model', () => {
    const clients = createRoleClients({
      provider: 'anthropic',
      apiKey: 'test-secret',
      model: 'model-small',
      maxTokens: 1024,
      temperature: 0,
      roleModels: { planner: 'model-large' },
    });
    expect(clients.planner).not.toBe(clients.interpreter);
    expect(clients.interpreter).toBe(clients.summarizer);
    expect(clients.summarizer).toBe(clients.extractor);
  });

  it('should reuse a client for roles that name the same model', () => {
    const clients = createRoleClients({
      provider: 'mock',
      maxTokens: 1024,
      temperature: 0,
      roleModels: { planner: 'model-large', extractor: 'model-large' },
    });
    expect(clients.planner).toBe(clients.extractor);
    expect(clients.planner).not.toBe(clients.interpreter);
  });
});
