import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type { BatchReport, ExtractionMode, RunResult, Target } from '../schema/index.js';
import { extractionModeSchema } from '../schema/index.js';
import { createRoleClients, loadLLMConfig } from '../llm/index.js';
import { createChannelFactory } from '../channel/index.js';
import type { ChannelKind } from '../channel/index.js';
import { createAttackOracle } from '../core/oracle.js';
import type { AttackOracle } from '../core/oracle.js';
import { describeTarget, runBatch, runGoal, strategyFor } from '../core/coordinator.js';
import { ConfigError } from '../core/errors.js';
import {
  EXIT_CODES,
  batchExitCode,
  exitCodeFor,
  formatDuration,
  generateBatchJSON,
  generateBatchMarkdown,
  generateMarkdown,
  generateRunJSON,
  serializeJSON,
} from '../report/reporter.js';
import { DEFAULT_OUTPUT_DIR } from '../config/defaults.js';
import { loadTaskSet } from '../config/loader.js';
import { loadRunSettings, loadTargetConfig } from '../config/settings.js';
import type { RunSettings } from '../config/settings.js';
import * as log from '../utils/logger.js';
import { GoalSelectionCancelled, formatGoalList, resolveGoal } from './goals.js';

// ── Option parsers ───────────────────────────────────────────

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parseExtraction(value: string): ExtractionMode {
  const result = extractionModeSchema.safeParse(value);
  if (!result.success) throw new InvalidArgumentError('Expected "oracle" or "scan".');
  return result.data;
}

function parseChannel(value: string): ChannelKind {
  if (value === 'ssh' || value === 'mock') return value;
  throw new InvalidArgumentError('Expected "ssh" or "mock".');
}

// ── Shared wiring ────────────────────────────────────────────

function buildOracle(settings: RunSettings): AttackOracle {
  return createAttackOracle(createRoleClients(loadLLMConfig()), {
    timeoutMs: settings.oracleTimeoutMs,
  });
}

/** Abort on the first Ctrl-C; the run stops before its next stage. */
async function withInterrupt<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupt received, stopping after the current stage');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await run(controller.signal);
  } finally {
    process.off('SIGINT', onSigint);
  }
}

async function writeArtifact(dir: string, name: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const file = path.join(dir, name);
  await writeFile(file, content, 'utf-8');
  return file;
}

function reportFailure(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof GoalSelectionCancelled) {
    process.stderr.write(`${message}\n`);
    process.exitCode = EXIT_CODES.cancelled;
    return;
  }
  const prefix = err instanceof ConfigError ? 'Config error' : 'Error';
  process.stderr.write(`${prefix}: ${message}\n`);
  process.exitCode = EXIT_CODES.config;
}

// ── Stderr summaries ─────────────────────────────────────────

function printRunSummary(run: RunResult, target: Target): void {
  process.stderr.write(`\n--- redloop Result ---\n`);
  process.stderr.write(`Target:   ${describeTarget(target)}\n`);
  process.stderr.write(`Goal:     ${run.goal}\n`);
  process.stderr.write(`Outcome:  ${run.outcome}\n`);
  process.stderr.write(`Steps:    ${String(run.stepCount)} / ${String(run.maxSteps)}\n`);
  process.stderr.write(`Findings: ${String(run.findings.length)}\n`);
  if (run.error !== null) process.stderr.write(`Error:    ${run.error}\n`);
  process.stderr.write(`Time:     ${formatDuration(run.durationMs)}\n\n`);
}

function printBatchSummary(batch: BatchReport): void {
  const { summary } = batch;
  process.stderr.write(`\n--- redloop Batch Result ---\n`);
  process.stderr.write(`Target:    ${batch.target}\n`);
  process.stderr.write(
    `Completed: ${String(summary.completedTasks)}/${String(summary.totalTasks)} (${String(summary.completionRate)}%)\n`,
  );
  process.stderr.write(`Findings:  ${String(summary.totalFindings)}\n`);
  process.stderr.write(`Time:      ${formatDuration(batch.durationMs)}\n\n`);
}

// ── attack: single goal ──────────────────────────────────────

interface AttackOptions {
  pick?: number;
  interactive?: true;
  maxSteps?: number;
  summarizer: boolean;
  extract: ExtractionMode;
  channel: ChannelKind;
  json?: true;
  reportPath: string;
}

export function registerAttackCommand(program: Command): void {
  program
    .command('attack')
    .description('Pursue a single goal against the target configured in the environment')
    .argument('[goal]', 'Natural language assessment goal')
    .option('--pick <n>', 'Use default goal n (see `redloop goals`)', parsePositiveInt)
    .option('-i, --interactive', 'Choose a default goal or type one at a prompt')
    .option('--max-steps <n>', 'Override the step budget', parsePositiveInt)
    .option('--no-summarizer', 'Never condense the transcript')
    .option('--extract <mode>', 'Findings extraction: oracle or scan', parseExtraction, 'oracle')
    .option('--channel <kind>', 'Remote channel: ssh or mock', parseChannel, 'ssh')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Artifact directory', DEFAULT_OUTPUT_DIR)
    .action(async (goalArg: string | undefined, opts: AttackOptions) => {
      try {
        const goal = await resolveGoal({
          goal: goalArg,
          pick: opts.pick,
          interactive: opts.interactive,
        });
        const env = loadRunSettings();
        const settings: RunSettings = {
          ...env,
          maxSteps: opts.maxSteps ?? env.maxSteps,
          useSummarizer: opts.summarizer && env.useSummarizer,
        };
        const target = loadTargetConfig();
        const oracle = buildOracle(settings);

        log.section(`Attack: ${goal}`);
        const run = await withInterrupt((signal) =>
          runGoal(goal, {
            oracle,
            channel: createChannelFactory(opts.channel, target),
            settings,
            extract: strategyFor(opts.extract, oracle),
            signal,
          }),
        );

        const outputDir = path.resolve(opts.reportPath);
        const json = serializeJSON(generateRunJSON(run));
        await writeArtifact(outputDir, 'report.json', json + '\n');
        const mdPath = await writeArtifact(outputDir, 'report.md', generateMarkdown(run));
        log.info(`Report written to ${mdPath}`);

        if (opts.json) process.stdout.write(json + '\n');

        printRunSummary(run, target);
        process.exitCode = exitCodeFor(run.outcome);
      } catch (err) {
        reportFailure(err);
      }
    });
}

// ── goals: default goal list ─────────────────────────────────

export function registerGoalsCommand(program: Command): void {
  program
    .command('goals')
    .description('List the default goals offered by `attack --pick` and `attack --interactive`')
    .action(() => {
      process.stdout.write(formatGoalList());
    });
}

// ── batch: task set file ─────────────────────────────────────

interface BatchOptions {
  config: string;
  reportPath?: string;
  channel: ChannelKind;
  json?: true;
}

export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Run every task of a YAML/JSON task set in dependency order')
    .requiredOption('--config <path>', 'Path to the task set file')
    .option('--report-path <dir>', 'Artifact directory (defaults to the task set output_dir)')
    .option('--channel <kind>', 'Remote channel: ssh or mock', parseChannel, 'ssh')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: BatchOptions) => {
      try {
        const taskSet = await loadTaskSet(opts.config);
        const settings = loadRunSettings();
        const oracle = buildOracle(settings);
        const outputDir = path.resolve(
          opts.reportPath ?? taskSet.globalSettings.outputDir ?? DEFAULT_OUTPUT_DIR,
        );

        log.section(`Batch: ${String(taskSet.tasks.length)} tasks against ${describeTarget(taskSet.target)}`);
        const batch = await withInterrupt((signal) =>
          runBatch(taskSet, {
            oracle,
            settings,
            channelFor: (target) => createChannelFactory(opts.channel, target),
            signal,
            // Same document shape as the final file, with the tasks finished so far.
            onTaskComplete: async (_result, progress) => {
              await writeArtifact(
                outputDir,
                'batch-results.json',
                serializeJSON(generateBatchJSON(progress)) + '\n',
              );
            },
          }),
        );

        const json = serializeJSON(generateBatchJSON(batch));
        await writeArtifact(outputDir, 'batch-results.json', json + '\n');
        const mdPath = await writeArtifact(outputDir, 'batch-report.md', generateBatchMarkdown(batch));
        log.info(`Batch report written to ${mdPath}`);

        if (opts.json) process.stdout.write(json + '\n');

        printBatchSummary(batch);
        process.exitCode = batchExitCode(batch);
      } catch (err) {
        reportFailure(err);
      }
    });
}
