import { describe, it, expect } from 'vitest';

import { taskSetSchema } from '../schema/index.js';
import {
  CycleError,
  MissingRefError,
  resolveOrder,
  resolveTaskSettings,
} from './dependencyResolver.js';
import { ConfigError } from './errors.js';

const task = (id: string, requires: string[] = []) => ({ id, requires });

describe('resolveOrder', () => {
  it('should place every task after its prerequisites', () => {
    const result = resolveOrder([task('3', ['1', '2']), task('1'), task('2', ['1'])]);
    expect(result).toEqual({ ok: true, order: ['1', '2', '3'] });
  });

  it('should keep declaration order for independent tasks', () => {
    expect(resolveOrder([task('c'), task('a'), task('b')])).toEqual({
      ok: true,
      order: ['c', 'a', 'b'],
    });
  });

  it('should list a shared prerequisite once', () => {
    const result = resolveOrder([task('x', ['base']), task('y', ['base']), task('base')]);
    expect(result).toEqual({ ok: true, order: ['base', 'x', 'y'] });
  });

  it('should report a cycle', () => {
    const result = resolveOrder([task('a', ['b']), task('b', ['a'])]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CycleError);
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe('Circular dependency detected involving task a');
    }
  });

  it('should report a self-dependency as a cycle', () => {
    const result = resolveOrder([task('a', ['a'])]);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(CycleError);
  });

  it('should report a missing reference', () => {
    const result = resolveOrder([task('1', ['9'])]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(MissingRefError);
      expect(result.error.message).toBe('Task 1 depends on non-existent task 9');
    }
  });
});

describe('resolveTaskSettings', () => {
  const taskSet = taskSetSchema.parse({
    target: { host: '10.0.0.5', port: 22, username: 'root', password: 'test-secret' },
    global_settings: { max_steps: 10, extraction: 'scan' },
    tasks: [
      { id: 1, name: 'Own limit', goal: 'g', max_steps: 5, use_summarizer: false },
      { id: 2, name: 'Inherits', goal: 'g', target: { port: 2222 } },
    ],
  });

  it('should prefer the task value', () => {
    const [own] = taskSet.tasks;
    if (!own) throw new Error('fixture');
    expect(resolveTaskSettings(taskSet, own)).toEqual({
      maxSteps: 5,
      useSummarizer: false,
      extraction: 'scan',
      target: { host: '10.0.0.5', port: 22, username: 'root', password: 'test-secret' },
    });
  });

  it('should fall back to batch settings and merge the target override', () => {
    const inherits = taskSet.tasks[1];
    if (!inherits) throw new Error('fixture');
    expect(resolveTaskSettings(taskSet, inherits)).toEqual({
      maxSteps: 10,
      useSummarizer: true,
      extraction: 'scan',
      target: { host: '10.0.0.5', port: 2222, username: 'root', password: 'test-secret' },
    });
  });

  it('should use built-in defaults when nothing is set', () => {
    const bare = taskSetSchema.parse({
      target: { host: 'lab' },
      tasks: [{ id: 'only', name: 'n', goal: 'g' }],
    });
    const only = bare.tasks[0];
    if (!only) throw new Error('fixture');
    expect(resolveTaskSettings(bare, only)).toEqual({
      maxSteps: 15,
      useSummarizer: true,
      extraction: 'oracle',
      target: { host: 'lab' },
    });
  });
});
