import { z } from 'zod';

import { findingSchema } from './findings.js';

// ── StepRecord ────────────────────────────────────────────────

export const stepRecordSchema = z.object({
  planText: z.string(),
  command: z.string(),
  output: z.string(),
  timestamp: z.string().datetime(),
});

export type StepRecord = z.infer<typeof stepRecordSchema>;

// ── Run errors & outcomes ─────────────────────────────────────

export const runErrorKindSchema = z.enum(['channel', 'plan', 'oracle']);

export type RunErrorKind = z.infer<typeof runErrorKindSchema>;

export interface RunError {
  kind: RunErrorKind;
  message: string;
}

export const runOutcomeSchema = z.enum([
  'completed',
  'exhausted',
  'failed',
  'cancelled',
]);

export type RunOutcome = z.infer<typeof runOutcomeSchema>;

// ── RunResult ─────────────────────────────────────────────────

export const runResultSchema = z.object({
  goal: z.string().min(1),
  goalReached: z.boolean(),
  stepCount: z.number().int().nonnegative(),
  maxSteps: z.number().int().positive(),
  outcome: runOutcomeSchema,
  findings: z.array(findingSchema),
  findingsSummary: z.string().optional(),
  transcript: z.array(stepRecordSchema),
  error: z.string().nullable(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type RunResult = z.infer<typeof runResultSchema>;

// ── Batch ─────────────────────────────────────────────────────

export const taskResultSchema = runResultSchema.extend({
  taskId: z.string().min(1),
  name: z.string().min(1),
  category: z.string().min(1),
});

export type TaskResult = z.infer<typeof taskResultSchema>;

export const categoryStatsSchema = z.object({
  total: z.number().int().nonnegative(),
  completed: z.number().int().nonnegative(),
  findings: z.number().int().nonnegative(),
});

export type CategoryStats = z.infer<typeof categoryStatsSchema>;

export const batchSummarySchema = z.object({
  totalTasks: z.number().int().nonnegative(),
  completedTasks: z.number().int().nonnegative(),
  completionRate: z.number().min(0).max(100),
  totalFindings: z.number().int().nonnegative(),
  categories: z.record(categoryStatsSchema),
});

export type BatchSummary = z.infer<typeof batchSummarySchema>;

export const batchReportSchema = z.object({
  target: z.string().min(1),
  order: z.array(z.string()),
  tasks: z.array(taskResultSchema),
  summary: batchSummarySchema,
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type BatchReport = z.infer<typeof batchReportSchema>;

// ── Deterministic outcome decision ───────────────────────────

export function computeOutcome(input: {
  goalReached: boolean;
  cancelled: boolean;
  error: RunError | undefined;
}): RunOutcome {
  if (input.cancelled) return 'cancelled';
  if (input.goalReached) return 'completed';
  if (input.error !== undefined) return 'failed';
  return 'exhausted';
}

// ── Validators ────────────────────────────────────────────────

export function parseRunResult(data: unknown): RunResult {
  return runResultSchema.parse(data);
}

export function parseBatchReport(data: unknown): BatchReport {
  return batchReportSchema.parse(data);
}
