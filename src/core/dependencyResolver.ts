import type { ExtractionMode, Target, Task, TaskSet } from '../schema/index.js';
import { mergeTarget } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { ConfigError } from './errors.js';

// ── Errors ───────────────────────────────────────────────────

export class CycleError extends ConfigError {
  constructor(readonly taskId: string) {
    super(`Circular dependency detected involving task ${taskId}`);
    this.name = 'CycleError';
  }
}

export class MissingRefError extends ConfigError {
  constructor(
    readonly taskId: string,
    readonly missingDep: string,
  ) {
    super(`Task ${taskId} depends on non-existent task ${missingDep}`);
    this.name = 'MissingRefError';
  }
}

export type ResolveResult =
  | { ok: true; order: string[] }
  | { ok: false; error: CycleError | MissingRefError };

// ── Topological order ───────────────────────────────────────

type Mark = 'in_progress' | 'done';

/**
 * Order tasks so that every task follows everything it requires.
 * Depth-first, three-colour; roots are visited in declaration order so the
 * output is deterministic for identical input.
 */
export function resolveOrder(
  tasks: readonly Pick<Task, 'id' | 'requires'>[],
): ResolveResult {
  const byId = new Map(tasks.map((t) => [t.id, t]));
  const marks = new Map<string, Mark>();
  const order: string[] = [];

  function visit(id: string): CycleError | MissingRefError | undefined {
    const mark = marks.get(id);
    if (mark === 'done') return undefined;
    if (mark === 'in_progress') return new CycleError(id);

    marks.set(id, 'in_progress');

    for (const dep of byId.get(id)?.requires ?? []) {
      if (!byId.has(dep)) return new MissingRefError(id, dep);
      const failure = visit(dep);
      if (failure) return failure;
    }

    marks.set(id, 'done');
    order.push(id);
    return undefined;
  }

  for (const task of tasks) {
    const failure = visit(task.id);
    if (failure) return { ok: false, error: failure };
  }

  return { ok: true, order };
}

// ── Effective per-task settings ─────────────────────────────

export interface EffectiveTaskSettings {
  maxSteps: number;
  useSummarizer: boolean;
  extraction: ExtractionMode;
  target: Target;
}

/** Task override, then batch setting, then hardcoded default. */
export function resolveTaskSettings(
  taskSet: Pick<TaskSet, 'target' | 'globalSettings'>,
  task: Task,
): EffectiveTaskSettings {
  const global = taskSet.globalSettings;
  return {
    maxSteps: task.maxSteps ?? global.maxSteps ?? LIMITS.TASK_MAX_STEPS,
    useSummarizer: task.useSummarizer ?? global.useSummarizer ?? true,
    extraction: task.extraction ?? global.extraction ?? 'oracle',
    target: mergeTarget(taskSet.target, task.target),
  };
}
