import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { ConfigError, formatIssues } from '../core/errors.js';
import { resolveOrder } from '../core/dependencyResolver.js';
import { taskSetSchema } from '../schema/index.js';
import type { TaskSet } from '../schema/index.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a task set from YAML (or `.json`).
 * Every problem surfaces as a ConfigError before any task runs, including
 * dependency cycles and references to unknown task ids.
 */
export async function loadTaskSet(configPath: string): Promise<TaskSet> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read task set ${configPath}: ${reason}`);
  }

  return parseTaskSet(raw, configPath.endsWith('.json') ? 'json' : 'yaml', configPath);
}

export function parseTaskSet(
  raw: string,
  format: 'json' | 'yaml',
  source = '<inline>',
): TaskSet {
  let document: unknown;
  try {
    document = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Malformed ${format.toUpperCase()} in ${source}: ${reason}`);
  }

  let taskSet: TaskSet;
  try {
    taskSet = taskSetSchema.parse(document);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ConfigError(`Invalid task set ${source}: ${formatIssues(err)}`);
    }
    throw err;
  }

  const resolved = resolveOrder(taskSet.tasks);
  if (!resolved.ok) throw resolved.error;

  return taskSet;
}
