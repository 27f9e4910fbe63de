/**
 * LLM abstraction module.
 * Provider-agnostic interface behind the attack oracle.
 * Only module allowed to make LLM API calls.
 */

import { ConfigError } from '../core/errors.js';
import type { LLMClient, LLMConfig, OracleRole, RoleClients } from './client.js';
import { apiKeyVariable } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockCall, MockResponder, MockLLMClient } from './mock.js';
export { DEFAULT_RETRY_POLICY, RateLimitedError, withRateLimitRetry } from './retry.js';
export type { RetryPolicy } from './retry.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  if (config.provider === 'mock') return createMockClient();

  if (!config.apiKey) {
    throw new ConfigError(
      `${apiKeyVariable(config.provider)} is required when LLM_PROVIDER=${config.provider}`,
    );
  }

  const options = {
    apiKey: config.apiKey,
    model: config.model,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  };

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(options);
    case 'openai':
      return createOpenAIClient(options);
  }
}

/** Clients for the four oracle roles, one per distinct model. */
export function createRoleClients(config: LLMConfig): RoleClients {
  const byModel = new Map<string, LLMClient>();

  const forRole = (role: OracleRole): LLMClient => {
    const model = config.roleModels?.[role] ?? config.model;
    const key = model ?? '';
    const cached = byModel.get(key);
    if (cached) return cached;

    const client = createLLMClient({ ...config, model });
    byModel.set(key, client);
    return client;
  };

  return {
    planner: forRole('planner'),
    interpreter: forRole('interpreter'),
    summarizer: forRole('summarizer'),
    extractor: forRole('extractor'),
  };
}
