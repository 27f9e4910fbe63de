import type { LLMClient } from '../llm/index.js';
import { renderPrompt } from './prompts.js';
import { withTimeout } from './oracleCall.js';
import type { OracleCallOptions } from './oracleCall.js';

export async function condenseContext(
  client: LLMClient,
  context: string,
  options: OracleCallOptions,
): Promise<string> {
  const systemPrompt = await renderPrompt('summarizer', {
    preamble: options.preamble,
    context,
  });

  const raw = await withTimeout('summarizer', options.timeoutMs, () =>
    client.generate(systemPrompt, 'Summarize the context above.'),
  );

  const summary = raw.trim();
  if (summary.length === 0) {
    throw new Error('Summarizer returned an empty summary');
  }
  return summary;
}
