import { z } from 'zod';

import type { LLMClient, ProviderOptions } from './client.js';
import { RateLimitedError, parseRetryAfter, withRateLimitRetry } from './retry.js';

const DEFAULT_MODEL = 'gpt-4o';
const COMPLETIONS_URL = 'https://api.openai.com/v1/chat/completions';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .nonempty(),
});

// ── Provider factory ─────────────────────────────────────────

export function createOpenAIClient(options: ProviderOptions): LLMClient {
  const model = options.model ?? DEFAULT_MODEL;

  const send = async (system: string, user: string): Promise<unknown> => {
    const response = await fetch(COMPLETIONS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${options.apiKey}`,
      },
      body: JSON.stringify({
        model,
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: user },
        ],
      }),
    });

    if (response.status === 429) {
      throw new RateLimitedError('openai', parseRetryAfter(response.headers.get('retry-after')));
    }
    if (!response.ok) {
      throw new Error(`OpenAI API error (${String(response.status)}): ${await response.text()}`);
    }
    return response.json();
  };

  return {
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const body = await withRateLimitRetry(() => send(systemPrompt, userPrompt), options.retry);
      const [choice] = chatResponseSchema.parse(body).choices;

      if (!choice.message.content) {
        throw new Error(`OpenAI API returned no content (finish reason: ${String(choice.finish_reason)})`);
      }
      return choice.message.content;
    },
  };
}
