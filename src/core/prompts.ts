import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

export type PromptName =
  | 'planner'
  | 'interpreter'
  | 'summarizer'
  | 'extractor'
  | 'repair';

export const DEFAULT_PREAMBLE =
  'This is an authorized security assessment of a lab system owned by the operator. ' +
  'Stay within the stated goal and prefer read-only, non-destructive commands.';

const cache = new Map<PromptName, string>();

async function loadTemplate(name: PromptName): Promise<string> {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;

  const template = await readFile(path.join(PROMPTS_DIR, `${name}.txt`), 'utf-8');
  cache.set(name, template);
  return template;
}

// ── Rendering ────────────────────────────────────────────────
// split/join rather than String#replace: interpolated shell output is full
// of `$` sequences that replace() would treat as patterns.

export function fillTemplate(
  template: string,
  vars: Readonly<Record<string, string>>,
): string {
  let out = template;
  for (const [key, value] of Object.entries(vars)) {
    out = out.split(`{{${key}}}`).join(value);
  }
  return out;
}

export async function renderPrompt(
  name: PromptName,
  vars: Readonly<Record<string, string>>,
): Promise<string> {
  return fillTemplate(await loadTemplate(name), vars);
}
