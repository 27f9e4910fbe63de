import Anthropic from '@anthropic-ai/sdk';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimitedError, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

export function createAnthropicClient(options: ProviderOptions): LLMClient {
  // Retries are ours, so the SDK's own are turned off.
  const client = new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  const model = options.model ?? DEFAULT_MODEL;

  const send = async (system: string, user: string): Promise<Anthropic.Message> => {
    try {
      return await client.messages.create({
        model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        system,
        messages: [{ role: 'user', content: user }],
      });
    } catch (err) {
      if (err instanceof Anthropic.RateLimitError) throw new RateLimitedError('anthropic');
      throw err;
    }
  };

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const response = await withRateLimitRetry(() => send(systemPrompt, userPrompt), options.retry);

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');
      if (text.length === 0) {
        throw new Error(`Anthropic API returned no text content (stop reason: ${String(response.stop_reason)})`);
      }

      return text;
    },
  };
}
