import type {
  BatchReport,
  Finding,
  RunOutcome,
  RunResult,
  ServiceFinding,
  TaskResult,
  VulnerabilityFinding,
} from '../schema/index.js';

export const REPORT_VERSION = '1.0';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  completed: 0,
  failed: 1,
  exhausted: 2,
  cancelled: 3,
  config: 4,
} as const;

export function exitCodeFor(outcome: RunOutcome): number {
  return EXIT_CODES[outcome];
}

/** Exhausted tasks are an ordinary batch result; failures and cancellation are not. */
export function batchExitCode(batch: Pick<BatchReport, 'tasks' | 'order'>): number {
  const outcomes = batch.tasks.map((t) => t.outcome);
  if (outcomes.includes('cancelled') || batch.tasks.length < batch.order.length) {
    return EXIT_CODES.cancelled;
  }
  if (outcomes.includes('failed')) return EXIT_CODES.failed;
  return EXIT_CODES.completed;
}

// ── JSON generators ──────────────────────────────────────────

export type RunReportDocument = RunResult & { version: string; exitCode: number };
export type BatchReportDocument = BatchReport & { version: string; exitCode: number };

export function generateRunJSON(run: RunResult): RunReportDocument {
  return { version: REPORT_VERSION, exitCode: exitCodeFor(run.outcome), ...run };
}

export function generateBatchJSON(batch: BatchReport): BatchReportDocument {
  return { version: REPORT_VERSION, exitCode: batchExitCode(batch), ...batch };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown: single run ─────────────────────────────────────

export function generateMarkdown(run: RunResult): string {
  const lines: string[] = [];

  lines.push(`# Attack Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Goal** | ${escapeMarkdownCell(run.goal)} |`);
  lines.push(`| **Outcome** | **${run.outcome}** ${outcomeIcon(run.outcome)} |`);
  lines.push(`| **Goal Reached** | ${run.goalReached ? 'yes' : 'no'} |`);
  lines.push(`| **Steps** | ${String(run.stepCount)} / ${String(run.maxSteps)} |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  if (run.error !== null) {
    lines.push(`| **Error** | ${escapeMarkdownCell(run.error)} |`);
  }
  lines.push('');

  pushFindings(lines, run.findings, run.findingsSummary, '##');

  lines.push(`## Transcript`);
  lines.push('');

  if (run.transcript.length === 0) {
    lines.push('_No steps were executed._');
    lines.push('');
  }

  run.transcript.forEach((record, i) => {
    lines.push(`### Step ${String(i + 1)}: ${record.planText}`);
    lines.push('');
    const body = `$ ${record.command}\n${record.output.trimEnd()}`;
    const fence = fenceFor(body);
    lines.push(`${fence}sh`);
    lines.push(body);
    lines.push(fence);
    lines.push('');
  });

  return lines.join('\n');
}

// ── Markdown: batch ──────────────────────────────────────────

export function generateBatchMarkdown(batch: BatchReport): string {
  const lines: string[] = [];
  const { summary } = batch;

  lines.push(`# Batch Attack Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Target** | ${batch.target} |`);
  lines.push(`| **Tasks** | ${String(summary.totalTasks)} |`);
  lines.push(
    `| **Completed** | ${String(summary.completedTasks)} (${formatRate(summary.completionRate)}) |`,
  );
  lines.push(`| **Findings** | ${String(summary.totalFindings)} |`);
  lines.push(`| **Started** | ${batch.startedAt} |`);
  lines.push(`| **Finished** | ${batch.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(batch.durationMs)} |`);
  lines.push('');

  lines.push(`## Execution Order`);
  lines.push('');
  batch.order.forEach((id, i) => lines.push(`${String(i + 1)}. ${id}`));
  lines.push('');

  lines.push(`## Categories`);
  lines.push('');
  lines.push(`| Category | Tasks | Completed | Findings |`);
  lines.push(`|----------|-------|-----------|----------|`);
  for (const name of Object.keys(summary.categories).sort()) {
    const stats = summary.categories[name];
    if (!stats) continue;
    lines.push(
      `| ${escapeMarkdownCell(name)} | ${String(stats.total)} | ${String(stats.completed)} | ${String(stats.findings)} |`,
    );
  }
  lines.push('');

  lines.push(`## Tasks`);
  lines.push('');
  lines.push(`| ID | Name | Category | Outcome | Steps | Findings |`);
  lines.push(`|----|------|----------|---------|-------|----------|`);
  for (const task of batch.tasks) {
    lines.push(
      `| ${escapeMarkdownCell(task.taskId)} | ${escapeMarkdownCell(task.name)} | ${escapeMarkdownCell(task.category)} | ${task.outcome} ${outcomeIcon(task.outcome)} | ${String(task.stepCount)} / ${String(task.maxSteps)} | ${String(task.findings.length)} |`,
    );
  }
  lines.push('');

  lines.push(`## Task Details`);
  lines.push('');
  for (const task of batch.tasks) {
    pushTaskDetails(lines, task);
  }

  return lines.join('\n');
}

function pushTaskDetails(lines: string[], task: TaskResult): void {
  lines.push(`### ${task.taskId}: ${task.name}`);
  lines.push('');
  lines.push(`**Goal:** ${task.goal}`);
  lines.push('');
  lines.push(`**Outcome:** ${task.outcome} after ${String(task.stepCount)} steps`);
  lines.push('');
  if (task.error !== null) {
    lines.push(`**Error:** ${task.error}`);
    lines.push('');
  }
  pushFindings(lines, task.findings, task.findingsSummary, '####');
}

// ── Findings ─────────────────────────────────────────────────

function pushFindings(
  lines: string[],
  findings: readonly Finding[],
  summary: string | undefined,
  heading: '##' | '####',
): void {
  lines.push(`${heading} Findings`);
  lines.push('');

  if (summary) {
    lines.push(summary);
    lines.push('');
  }

  if (findings.length === 0) {
    lines.push('_No findings._');
    lines.push('');
    return;
  }

  const services: ServiceFinding[] = [];
  for (const finding of findings) {
    if (finding.kind === 'service') {
      services.push(finding);
    } else {
      pushVulnerability(lines, finding, heading === '##' ? '###' : '#####');
    }
  }

  if (services.length > 0) {
    lines.push(`| Port | Service |`);
    lines.push(`|------|---------|`);
    for (const s of services) {
      lines.push(`| ${s.port} | ${escapeMarkdownCell(s.service)} |`);
    }
    lines.push('');
  }
}

function pushVulnerability(
  lines: string[],
  finding: VulnerabilityFinding,
  heading: string,
): void {
  lines.push(`${heading} [${finding.severity.toUpperCase()}] ${finding.type}`);
  lines.push('');
  lines.push(finding.description);
  lines.push('');
  if (finding.evidence) {
    lines.push(`**Evidence:** ${finding.evidence}`);
    lines.push('');
  }
  if (finding.remediation) {
    lines.push(`**Remediation:** ${finding.remediation}`);
    lines.push('');
  }
}

// ── Helpers ──────────────────────────────────────────────────

function outcomeIcon(outcome: RunOutcome): string {
  switch (outcome) {
    case 'completed':
      return '[DONE]';
    case 'exhausted':
      return '[LIMIT]';
    case 'failed':
      return '[FAIL]';
    case 'cancelled':
      return '[STOP]';
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function formatRate(value: number): string {
  return `${String(value)}%`;
}

// Longer than any backtick run inside the body.
function fenceFor(body: string): string {
  const longest = Math.max(0, ...(body.match(/`+/g) ?? []).map((run) => run.length));
  return '`'.repeat(Math.max(3, longest + 1));
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
