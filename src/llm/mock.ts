import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"result":"mock"}';

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
}

export type MockResponder = (call: MockCall, callIndex: number) => string;

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for tests and offline dry runs.
 * Hands out canned responses in order (or asks a responder), falling back to a
 * default, and records every call it receives.
 */
export function createMockClient(
  responses?: readonly string[] | MockResponder,
): MockLLMClient {
  const calls: MockCall[] = [];

  return {
    calls,
    async generate(systemPrompt: string, userPrompt: string): Promise<string> {
      const call = { systemPrompt, userPrompt };
      const callIndex = calls.length;
      calls.push(call);

      if (typeof responses === 'function') return responses(call, callIndex);
      return responses?.[callIndex] ?? DEFAULT_RESPONSE;
    },
  };
}
