import { describe, it, expect, vi } from 'vitest';

import { createMockChannel } from '../channel/index.js';
import type { ChannelFactory } from '../channel/index.js';
import { loadRunSettings } from '../config/settings.js';
import type { FindingsReport, Plan, Target, TaskResult } from '../schema/index.js';
import { taskSetSchema } from '../schema/index.js';
import { runBatch, runGoal, summarizeBatch } from './coordinator.js';
import { CycleError } from './dependencyResolver.js';
import type { AttackOracle } from './oracle.js';
import type { PlannerInput } from './planner.js';

const settings = loadRunSettings({});
const now = () => new Date('2024-01-01T00:00:00.000Z');

function makeOracle(plan: (input: PlannerInput) => Promise<Plan>): AttackOracle {
  return {
    plan,
    translate: async () => 'nmap -sV lab',
    condense: async () => 'summary',
    extractFindings: async (): Promise<FindingsReport> => ({
      vulnerabilities: [],
      summary: 'nothing confirmed',
    }),
  };
}

// First task is already satisfied, the rest keep scanning.
const planByGoal = async (input: PlannerInput): Promise<Plan> => ({
  steps: ['Scan services'],
  verification: 'services listed',
  goalReached: input.goal === 'g1',
});

const taskSet = taskSetSchema.parse({
  target: { host: '10.0.0.5' },
  global_settings: { max_steps: 2, extraction: 'scan' },
  tasks: [
    { id: 2, name: 'Second', goal: 'g2', category: 'recon', requires: [1] },
    { id: 1, name: 'First', goal: 'g1', category: 'recon' },
    { id: 3, name: 'Third', goal: 'g3', category: 'privesc', max_steps: 1, target: { port: 2222 } },
  ],
});

function channelFor(target: Target): ChannelFactory {
  const outputs = target.port === 2222 ? ['80/tcp open http'] : [];
  return createMockChannel({ outputs }).factory;
}

describe('runGoal', () => {
  it('should use oracle extraction by default', async () => {
    const result = await runGoal('g2', {
      oracle: makeOracle(planByGoal),
      channel: createMockChannel().factory,
      settings,
      maxSteps: 1,
      now,
    });

    expect(result.stepCount).toBe(1);
    expect(result.findingsSummary).toBe('nothing confirmed');
  });
});

describe('runBatch', () => {
  it('should run tasks in dependency order with merged settings', async () => {
    const channelSpy = vi.fn(channelFor);
    const seen: Array<[number, number]> = [];

    const report = await runBatch(taskSet, {
      oracle: makeOracle(planByGoal),
      settings,
      channelFor: channelSpy,
      now,
      onTaskComplete: (_result, progress) => {
        seen.push([progress.tasks.length, progress.summary.totalTasks]);
      },
    });

    expect(report.order).toEqual(['1', '2', '3']);
    expect(report.tasks.map((t) => [t.taskId, t.outcome, t.stepCount])).toEqual([
      ['1', 'completed', 0],
      ['2', 'exhausted', 2],
      ['3', 'exhausted', 1],
    ]);
    expect(report.tasks[2]?.findings).toEqual([
      { kind: 'service', port: '80/tcp', service: 'open http' },
    ]);
    expect(channelSpy.mock.calls.map(([t]) => t)).toEqual([
      { host: '10.0.0.5' },
      { host: '10.0.0.5' },
      { host: '10.0.0.5', port: 2222 },
    ]);
    expect(seen).toEqual([
      [1, 1],
      [2, 2],
      [3, 3],
    ]);
    expect(report.target).toBe('10.0.0.5:22');
    expect(report.summary).toEqual({
      totalTasks: 3,
      completedTasks: 1,
      completionRate: 33.33,
      totalFindings: 1,
      categories: {
        recon: { total: 2, completed: 1, findings: 0 },
        privesc: { total: 1, completed: 0, findings: 1 },
      },
    });
  });

  it('should keep the executed steps of a task whose planner fails mid-run', async () => {
    let g2Calls = 0;
    const oracle = makeOracle(async (input) => {
      if (input.goal === 'g2' && ++g2Calls === 2) throw new Error('503 upstream');
      return planByGoal(input);
    });

    const report = await runBatch(taskSet, { oracle, settings, channelFor, now });

    expect(report.tasks).toHaveLength(3);
    expect(report.tasks[1]).toMatchObject({
      taskId: '2',
      outcome: 'failed',
      error: 'Planner failed: 503 upstream',
      stepCount: 1,
      maxSteps: 2,
    });
    expect(report.tasks[1]?.transcript.map((r) => r.command)).toEqual(['nmap -sV lab']);
    expect(report.tasks[2]?.outcome).toBe('exhausted');
  });

  it('should refuse a cyclic task set before running anything', async () => {
    const cyclic = taskSetSchema.parse({
      target: { host: 'lab' },
      tasks: [
        { id: 'a', name: 'A', goal: 'g', requires: ['b'] },
        { id: 'b', name: 'B', goal: 'g', requires: ['a'] },
      ],
    });
    const channelSpy = vi.fn(channelFor);

    await expect(
      runBatch(cyclic, { oracle: makeOracle(planByGoal), settings, channelFor: channelSpy }),
    ).rejects.toBeInstanceOf(CycleError);
    expect(channelSpy).not.toHaveBeenCalled();
  });

  it('should run no further tasks once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const report = await runBatch(taskSet, {
      oracle: makeOracle(planByGoal),
      settings,
      channelFor,
      signal: controller.signal,
      now,
    });

    expect(report.tasks).toEqual([]);
    expect(report.order).toEqual(['1', '2', '3']);
  });
});

describe('summarizeBatch', () => {
  it('should report zero completion for an empty batch', () => {
    expect(summarizeBatch([])).toEqual({
      totalTasks: 0,
      completedTasks: 0,
      completionRate: 0,
      totalFindings: 0,
      categories: {},
    });
  });

  it('should count only completed outcomes', () => {
    const result = (outcome: TaskResult['outcome']): TaskResult => ({
      taskId: outcome,
      name: outcome,
      category: 'c',
      goal: 'g',
      goalReached: outcome === 'completed',
      stepCount: 1,
      maxSteps: 1,
      outcome,
      findings: [],
      transcript: [],
      error: null,
      startedAt: '2024-01-01T00:00:00.000Z',
      finishedAt: '2024-01-01T00:00:00.000Z',
      durationMs: 0,
    });

    const summary = summarizeBatch([result('completed'), result('failed')]);
    expect(summary.completedTasks).toBe(1);
    expect(summary.completionRate).toBe(50);
  });
});
