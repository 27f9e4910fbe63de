import type { LLMClient } from '../llm/index.js';
import { renderPrompt } from './prompts.js';
import { withTimeout } from './oracleCall.js';
import type { OracleCallOptions } from './oracleCall.js';

export interface InterpreterInput {
  context: string;
  step: string;
}

/** Translate one plan step into raw command text (sanitized by the caller). */
export async function translateStep(
  client: LLMClient,
  input: InterpreterInput,
  options: OracleCallOptions,
): Promise<string> {
  const systemPrompt = await renderPrompt('interpreter', {
    preamble: options.preamble,
    step: input.step,
    context: input.context,
  });

  const raw = await withTimeout('interpreter', options.timeoutMs, () =>
    client.generate(systemPrompt, `Convert this step into one shell command: ${input.step}`),
  );

  return raw.trim();
}
