import type { StepRecord } from '../schema/index.js';
import { CONTEXT } from '../config/defaults.js';

// ── Public types ─────────────────────────────────────────────

export interface ContextWindowOptions {
  /** Hard character budget for every rendered view. */
  maxChars?: number | undefined;
}

export interface RenderOptions {
  /** Apply the character budget. Off, the view carries every step verbatim. */
  truncate?: boolean | undefined;
}

// ── Rendering constants ──────────────────────────────────────

export const STEP_MARKER = '--- Step ';
export const TRUNCATION_MARKER = '[truncated]\n\n';
export const ELISION_MARKER = '\n[... output elided ...]\n';

const HISTORY_LABEL = 'HISTORY:\n';
const SUMMARY_LABEL = 'HISTORY SUMMARY:\n';
const PLAN_LABEL = 'CURRENT PLAN:\n';

export function formatHeader(goal: string): string {
  return `GOAL: ${goal}\n\n`;
}

/**
 * Shorten `output` to `maxChars` by cutting out its middle. The head and tail
 * of a command's output usually carry the banner and the verdict.
 */
export function elideOutput(output: string, maxChars: number): string {
  if (output.length <= maxChars) return output;
  const room = Math.max(0, maxChars - ELISION_MARKER.length);
  const head = Math.ceil(room / 2);
  const tail = room - head;
  return output.slice(0, head) + ELISION_MARKER + (tail > 0 ? output.slice(-tail) : '');
}

export function formatStep(
  record: StepRecord,
  index: number,
  maxOutputChars: number = Number.POSITIVE_INFINITY,
): string {
  return (
    `${STEP_MARKER}${String(index + 1)} ---\n` +
    `Plan: ${record.planText}\n` +
    `Command: ${record.command}\n` +
    `Output: ${elideOutput(record.output, maxOutputChars)}\n\n`
  );
}

export function formatPlan(planSteps: readonly string[]): string {
  if (planSteps.length === 0) return '';
  const lines = planSteps.map((s, i) => `${String(i + 1)}. ${s}`);
  return `${PLAN_LABEL}${lines.join('\n')}\n`;
}

// ── ContextWindow ────────────────────────────────────────────

/**
 * Append-only transcript of a run with derived, bounded text views.
 *
 * Windows are values: `append` and `condense` return a new window and leave
 * the receiver untouched. Successive appends share one backing array, so a
 * chain of appends stays amortized O(1); appending to a stale window copies
 * its prefix first.
 */
export class ContextWindow {
  private constructor(
    readonly goal: string,
    private readonly log: StepRecord[],
    readonly size: number,
    readonly maxChars: number,
    readonly summary: string | undefined,
    private readonly condensedThrough: number,
  ) {}

  static create(goal: string, options: ContextWindowOptions = {}): ContextWindow {
    return new ContextWindow(
      goal,
      [],
      0,
      options.maxChars ?? CONTEXT.MAX_CHARS,
      undefined,
      0,
    );
  }

  // ── Log ────────────────────────────────────────────────────

  append(step: StepRecord): ContextWindow {
    const log = this.log.length === this.size ? this.log : this.log.slice(0, this.size);
    log.push(Object.freeze({ ...step }));
    return new ContextWindow(
      this.goal,
      log,
      this.size + 1,
      this.maxChars,
      this.summary,
      this.condensedThrough,
    );
  }

  get records(): readonly StepRecord[] {
    return this.log.slice(0, this.size);
  }

  get isCondensed(): boolean {
    return this.summary !== undefined;
  }

  /** Switch to condensed mode; records appended later render after the summary. */
  condense(summary: string): ContextWindow {
    return new ContextWindow(
      this.goal,
      this.log,
      this.size,
      this.maxChars,
      summary,
      this.size,
    );
  }

  // ── Views ──────────────────────────────────────────────────

  /** Every step in order, truncated from the front when over budget. */
  renderFull(planSteps: readonly string[] = [], options: RenderOptions = {}): string {
    return this.view(formatHeader(this.goal), 0, planSteps, options);
  }

  /** Goal header, the given summary in place of all steps, and the plan. */
  renderCondensed(summary: string, planSteps: readonly string[] = []): string {
    return this.view(this.condensedPrefix(summary), this.size, planSteps, {});
  }

  /** The current view: full, or the summary followed by later steps. */
  render(planSteps: readonly string[] = [], options: RenderOptions = {}): string {
    if (this.summary === undefined) return this.renderFull(planSteps, options);
    return this.view(this.condensedPrefix(this.summary), this.condensedThrough, planSteps, options);
  }

  /** Length of the current view before truncation. */
  measure(planSteps: readonly string[] = []): number {
    return this.render(planSteps, { truncate: false }).length;
  }

  // ── Internals ──────────────────────────────────────────────

  private condensedPrefix(summary: string): string {
    return `${formatHeader(this.goal)}${SUMMARY_LABEL}${summary}\n\n`;
  }

  private entries(from: number): StepEntry[] {
    const out: StepEntry[] = [];
    for (let i = from; i < this.size; i++) {
      const record = this.log[i];
      if (record) out.push({ record, index: i, text: formatStep(record, i) });
    }
    return out;
  }

  private view(
    prefix: string,
    from: number,
    planSteps: readonly string[],
    options: RenderOptions,
  ): string {
    const entries = this.entries(from);
    const plan = formatPlan(planSteps);
    const history =
      entries.length > 0 ? HISTORY_LABEL + entries.map((e) => e.text).join('') : '';
    const full = prefix + history + plan;
    if (options.truncate === false || full.length <= this.maxChars) return full;

    // Keep the longest run of whole trailing steps that fits.
    const budget = this.maxChars - prefix.length - TRUNCATION_MARKER.length - plan.length;
    const kept: string[] = [];
    let used = 0;
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry === undefined) break;
      let block = entry.text;

      if (used + block.length > budget) {
        if (kept.length > 0) break;
        // The newest step overflows on its own: keep it, minus the middle of its output.
        const cap = entry.record.output.length - (block.length - budget);
        if (cap < ELISION_MARKER.length) break;
        block = formatStep(entry.record, entry.index, cap);
      }

      kept.unshift(block);
      used += block.length;
    }

    return prefix + TRUNCATION_MARKER + kept.join('') + plan;
  }
}

interface StepEntry {
  record: StepRecord;
  index: number;
  text: string;
}
