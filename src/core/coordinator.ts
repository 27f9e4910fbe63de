import type { ChannelFactory } from '../channel/index.js';
import type { RunSettings } from '../config/settings.js';
import type {
  BatchReport,
  BatchSummary,
  CategoryStats,
  ExtractionMode,
  RunResult,
  Target,
  Task,
  TaskResult,
  TaskSet,
} from '../schema/index.js';
import * as log from '../utils/logger.js';
import { resolveOrder, resolveTaskSettings } from './dependencyResolver.js';
import { oracleFindingsStrategy, serviceScanStrategy } from './extractor.js';
import type { FindingsStrategy } from './extractor.js';
import type { AttackOracle } from './oracle.js';
import { createRunState, runStateMachine } from './stateMachine.js';

// ── Single goal ──────────────────────────────────────────────

export interface RunGoalOptions {
  oracle: AttackOracle;
  channel: ChannelFactory;
  settings: RunSettings;
  /** Defaults to asking the oracle for vulnerabilities. */
  extract?: FindingsStrategy | undefined;
  maxSteps?: number | undefined;
  signal?: AbortSignal | undefined;
  now?: (() => Date) | undefined;
}

export async function runGoal(goal: string, options: RunGoalOptions): Promise<RunResult> {
  const { oracle, settings } = options;
  const initial = createRunState(goal, {
    maxSteps: options.maxSteps,
    maxContextChars: settings.maxContextChars,
  });

  return runStateMachine(initial, {
    oracle,
    channel: options.channel,
    extract: options.extract ?? oracleFindingsStrategy(oracle),
    settings,
    signal: options.signal,
    now: options.now,
  });
}

export function strategyFor(mode: ExtractionMode, oracle: AttackOracle): FindingsStrategy {
  return mode === 'scan' ? serviceScanStrategy : oracleFindingsStrategy(oracle);
}

// ── Batch ────────────────────────────────────────────────────

export interface RunBatchOptions {
  oracle: AttackOracle;
  settings: RunSettings;
  /** Builds a channel factory for a task's merged target. */
  channelFor: (target: Target) => ChannelFactory;
  signal?: AbortSignal | undefined;
  now?: (() => Date) | undefined;
  /** Called after every task with the batch report as it stands. */
  onTaskComplete?: ((result: TaskResult, progress: BatchReport) => Promise<void> | void) | undefined;
}

export function describeTarget(target: Target): string {
  const user = target.username !== undefined ? `${target.username}@` : '';
  return `${user}${target.host}:${String(target.port ?? 22)}`;
}

/**
 * Run every task of a batch, one at a time, in dependency order.
 * A task that throws is recorded as failed; the batch carries on.
 * Throws CycleError or MissingRefError before anything runs.
 */
export async function runBatch(taskSet: TaskSet, options: RunBatchOptions): Promise<BatchReport> {
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  const resolved = resolveOrder(taskSet.tasks);
  if (!resolved.ok) throw resolved.error;

  const byId = new Map(taskSet.tasks.map((t) => [t.id, t]));
  const results: TaskResult[] = [];

  for (const id of resolved.order) {
    const task = byId.get(id);
    if (task === undefined) continue;

    if (options.signal?.aborted) {
      log.warn(`Batch cancelled; ${String(resolved.order.length - results.length)} tasks not run`);
      break;
    }

    log.section(`Task ${task.id}: ${task.name}`);
    const result = await runTask(taskSet, task, options, now);
    results.push(result);
    log.info(`Task ${task.id} ${result.outcome} after ${String(result.stepCount)} steps`);

    if (options.onTaskComplete) {
      await options.onTaskComplete(result, buildReport(taskSet, resolved.order, results, startedAt, now()));
    }
  }

  return buildReport(taskSet, resolved.order, results, startedAt, now());
}

function buildReport(
  taskSet: TaskSet,
  order: string[],
  results: readonly TaskResult[],
  startedAt: Date,
  finishedAt: Date,
): BatchReport {
  return {
    target: describeTarget(taskSet.target),
    order: [...order],
    tasks: [...results],
    summary: summarizeBatch(results),
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  };
}

async function runTask(
  taskSet: TaskSet,
  task: Task,
  options: RunBatchOptions,
  now: () => Date,
): Promise<TaskResult> {
  const effective = resolveTaskSettings(taskSet, task);
  const identity = { taskId: task.id, name: task.name, category: task.category };
  const startedAt = now();

  try {
    const run = await runGoal(task.goal, {
      oracle: options.oracle,
      channel: options.channelFor(effective.target),
      settings: { ...options.settings, useSummarizer: effective.useSummarizer },
      extract: strategyFor(effective.extraction, options.oracle),
      maxSteps: effective.maxSteps,
      signal: options.signal,
      now,
    });
    return { ...identity, ...run };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Task ${task.id} failed: ${message}`);
    const finishedAt = now();
    return {
      ...identity,
      goal: task.goal,
      goalReached: false,
      stepCount: 0,
      maxSteps: effective.maxSteps,
      outcome: 'failed',
      findings: [],
      transcript: [],
      error: message,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    };
  }
}

// ── Summary ──────────────────────────────────────────────────

export function summarizeBatch(results: readonly TaskResult[]): BatchSummary {
  const categories: Record<string, CategoryStats> = {};
  let completedTasks = 0;
  let totalFindings = 0;

  for (const result of results) {
    const completed = result.outcome === 'completed';
    if (completed) completedTasks++;
    totalFindings += result.findings.length;

    const stats = categories[result.category] ?? { total: 0, completed: 0, findings: 0 };
    categories[result.category] = {
      total: stats.total + 1,
      completed: stats.completed + (completed ? 1 : 0),
      findings: stats.findings + result.findings.length,
    };
  }

  const totalTasks = results.length;
  const completionRate =
    totalTasks === 0 ? 0 : Math.round((completedTasks / totalTasks) * 10_000) / 100;

  return { totalTasks, completedTasks, completionRate, totalFindings, categories };
}
