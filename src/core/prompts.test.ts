import { describe, it, expect } from 'vitest';

import { fillTemplate, renderPrompt } from './prompts.js';

describe('fillTemplate', () => {
  it('should replace every occurrence of a placeholder', () => {
    expect(fillTemplate('{{a}} and {{a}} but {{b}}', { a: 'x', b: 'y' })).toBe('x and x but y');
  });

  it('should insert dollar sequences literally', () => {
    expect(fillTemplate('Output: {{context}}', { context: "echo $$ $& $'" })).toBe(
      "Output: echo $$ $& $'",
    );
  });
});

describe('renderPrompt', () => {
  it('should fill the planner template from disk', async () => {
    const prompt = await renderPrompt('planner', {
      preamble: 'Lab preamble.',
      goal: 'Find SUID binaries',
      context: 'GOAL: Find SUID binaries\n\n',
    });
    expect(prompt).toContain('Find SUID binaries');
    expect(prompt).toContain('Lab preamble.');
    expect(prompt).not.toContain('{{goal}}');
  });
});
