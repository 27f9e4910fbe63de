import type { ChannelFactory } from '../channel/index.js';
import { withChannel } from '../channel/index.js';
import type {
  Finding,
  Plan,
  RunError,
  RunResult,
  StepRecord,
} from '../schema/index.js';
import { computeOutcome } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { ContextWindow } from './contextWindow.js';
import type { FindingsStrategy } from './extractor.js';
import type { AttackOracle } from './oracle.js';
import { sanitizeCommand } from './sanitizer.js';

// ── Stages ───────────────────────────────────────────────────

export type Stage =
  | 'initialize'
  | 'plan'
  | 'interpret'
  | 'execute'
  | 'record'
  | 'condense'
  | 'selectNext'
  | 'extract'
  | 'terminal';

// ── Run state ────────────────────────────────────────────────

/**
 * Everything a stage may read or write. Stages never mutate a state; they
 * return a replacement.
 */
export interface RunState {
  readonly goal: string;
  readonly transcript: ContextWindow;
  readonly currentPlan: Plan | undefined;
  /** Index into `currentPlan.steps`; undefined means "re-plan next". */
  readonly currentStepIndex: number | undefined;
  readonly pendingCommand: string | undefined;
  readonly pendingOutput: string | undefined;
  readonly stepCount: number;
  readonly goalReached: boolean;
  readonly lastError: RunError | undefined;
  /** Per-run override of the settings' step budget. */
  readonly maxSteps: number | undefined;
  readonly findings: readonly Finding[];
  readonly findingsSummary: string | undefined;
  /** Consecutive re-plans without an executed step. */
  readonly replanStreak: number;
  readonly cancelled: boolean;
}

export interface CreateRunStateOptions {
  maxSteps?: number | undefined;
  maxContextChars?: number | undefined;
}

export function createRunState(
  goal: string,
  options: CreateRunStateOptions = {},
): RunState {
  return {
    goal,
    transcript: ContextWindow.create(goal, { maxChars: options.maxContextChars }),
    currentPlan: undefined,
    currentStepIndex: undefined,
    pendingCommand: undefined,
    pendingOutput: undefined,
    stepCount: 0,
    goalReached: false,
    lastError: undefined,
    maxSteps: options.maxSteps,
    findings: [],
    findingsSummary: undefined,
    replanStreak: 0,
    cancelled: false,
  };
}

// ── Collaborators ────────────────────────────────────────────

export interface StateMachineSettings {
  maxSteps: number;
  useSummarizer: boolean;
  condenseThreshold: number;
  commandTimeoutSeconds: number;
  maxReplans?: number | undefined;
}

export interface RunContext {
  oracle: AttackOracle;
  channel: ChannelFactory;
  extract: FindingsStrategy;
  settings: StateMachineSettings;
  now?: (() => Date) | undefined;
  signal?: AbortSignal | undefined;
}

export interface Transition {
  next: Stage;
  state: RunState;
}

type StageHandler = (state: RunState, ctx: RunContext) => Promise<Transition>;

// ── Derived values ───────────────────────────────────────────

export function effectiveMaxSteps(
  state: RunState,
  settings: StateMachineSettings,
): number {
  return state.maxSteps ?? settings.maxSteps;
}

export function currentStepText(state: RunState): string | undefined {
  if (state.currentPlan === undefined || state.currentStepIndex === undefined) {
    return undefined;
  }
  return state.currentPlan.steps[state.currentStepIndex];
}

export function remainingSteps(state: RunState): string[] {
  if (state.currentPlan === undefined || state.currentStepIndex === undefined) {
    return [];
  }
  return state.currentPlan.steps.slice(state.currentStepIndex);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Branch decision ──────────────────────────────────────────

export function decideBranch(
  state: RunState,
  settings: StateMachineSettings,
): 'continue' | 'finish' {
  if (state.goalReached) return 'finish';
  if (state.stepCount >= effectiveMaxSteps(state, settings)) return 'finish';
  if (state.lastError?.kind === 'channel') return 'finish';
  return 'continue';
}

// ── Stage handlers ───────────────────────────────────────────

export const initializeStage: StageHandler = async (state, ctx) => {
  try {
    await withChannel(ctx.channel, async () => undefined);
  } catch (err) {
    const message = errorMessage(err);
    log.error(message);
    return { next: 'terminal', state: { ...state, lastError: { kind: 'channel', message } } };
  }

  log.channel('Target reachable');
  return { next: 'plan', state };
};

export const planStage: StageHandler = async (state, ctx) => {
  const context = state.transcript.render(remainingSteps(state));

  let plan: Plan;
  try {
    plan = await ctx.oracle.plan({ goal: state.goal, context });
  } catch (err) {
    // Bad output and timeouts fall back inside the oracle; this is the provider failing.
    const message = `Planner failed: ${errorMessage(err)}`;
    log.error(message);
    return { next: 'extract', state: { ...state, lastError: { kind: 'oracle', message } } };
  }

  const next: RunState = {
    ...state,
    currentPlan: plan,
    currentStepIndex: plan.steps.length > 0 ? 0 : undefined,
    goalReached: plan.goalReached,
    // A fresh plan supersedes any non-fatal error from the last cycle.
    lastError: state.lastError?.kind === 'channel' ? state.lastError : undefined,
  };

  if (plan.goalReached) {
    log.info(`Goal reported reached: ${plan.verification}`);
    return { next: 'extract', state: next };
  }
  return { next: 'interpret', state: next };
};

function replan(state: RunState, ctx: RunContext, error: RunError): Transition {
  const streak = state.replanStreak + 1;
  const cap = ctx.settings.maxReplans ?? LIMITS.MAX_CONSECUTIVE_REPLANS;
  const next: RunState = {
    ...state,
    currentStepIndex: undefined,
    lastError: error,
    replanStreak: streak,
  };

  if (streak > cap) {
    log.error(`Giving up after ${String(cap)} consecutive re-plans: ${error.message}`);
    return { next: 'extract', state: next };
  }

  log.warn(`${error.message}; re-planning`);
  return { next: 'plan', state: next };
}

export const interpretStage: StageHandler = async (state, ctx) => {
  const stepText = currentStepText(state);
  if (stepText === undefined) {
    return replan(state, ctx, { kind: 'plan', message: 'No steps in the current plan' });
  }

  log.step(state.stepCount, effectiveMaxSteps(state, ctx.settings), stepText);

  let raw: string;
  try {
    raw = await ctx.oracle.translate({
      context: state.transcript.render(remainingSteps(state)),
      step: stepText,
    });
  } catch (err) {
    return replan(state, ctx, {
      kind: 'oracle',
      message: `Command translation failed: ${errorMessage(err)}`,
    });
  }

  const { command, blocked } = sanitizeCommand(raw);
  if (blocked) log.blocked(raw);
  if (command.length === 0) {
    return replan(state, ctx, { kind: 'oracle', message: 'Interpreter returned an empty command' });
  }

  return { next: 'execute', state: { ...state, pendingCommand: command } };
};

export const executeStage: StageHandler = async (state, ctx) => {
  const command = state.pendingCommand;
  if (command === undefined) {
    return replan(state, ctx, { kind: 'plan', message: 'No command to execute' });
  }

  log.command(command);

  try {
    const result = await withChannel(ctx.channel, (channel) =>
      channel.execute(command, ctx.settings.commandTimeoutSeconds),
    );

    if (result.error !== undefined) {
      const output = result.output
        ? `${result.output}\nError: ${result.error}`
        : `Error: ${result.error}`;
      return {
        next: 'record',
        state: { ...state, pendingOutput: output, lastError: { kind: 'channel', message: result.error } },
      };
    }

    return { next: 'record', state: { ...state, pendingOutput: result.output } };
  } catch (err) {
    const message = errorMessage(err);
    log.error(message);
    return {
      next: 'record',
      state: { ...state, pendingOutput: `Error: ${message}`, lastError: { kind: 'channel', message } },
    };
  }
};

export const recordStage: StageHandler = async (state, ctx) => {
  const now = ctx.now ?? (() => new Date());
  const record: StepRecord = {
    planText: currentStepText(state) ?? '',
    command: state.pendingCommand ?? '',
    output: state.pendingOutput ?? '',
    timestamp: now().toISOString(),
  };

  return {
    next: 'condense',
    state: {
      ...state,
      transcript: state.transcript.append(record),
      stepCount: state.stepCount + 1,
      pendingCommand: undefined,
      pendingOutput: undefined,
      replanStreak: 0,
    },
  };
};

export const condenseStage: StageHandler = async (state, ctx) => {
  let next = state;
  const planSteps = remainingSteps(state);

  if (
    ctx.settings.useSummarizer &&
    state.transcript.measure(planSteps) > ctx.settings.condenseThreshold
  ) {
    try {
      const summary = await ctx.oracle.condense(
        state.transcript.render(planSteps, { truncate: false }),
      );
      next = { ...state, transcript: state.transcript.condense(summary) };
      log.llm(`Context condensed to ${String(next.transcript.measure(planSteps))} chars`);
    } catch (err) {
      log.warn(`Condensation failed, keeping full transcript: ${errorMessage(err)}`);
    }
  }

  return {
    next: decideBranch(next, ctx.settings) === 'finish' ? 'extract' : 'selectNext',
    state: next,
  };
};

export const selectNextStage: StageHandler = async (state) => {
  const plan = state.currentPlan;
  const index = state.currentStepIndex;

  if (plan !== undefined && index !== undefined && plan.steps.length - index > 1) {
    return { next: 'interpret', state: { ...state, currentStepIndex: index + 1 } };
  }

  return { next: 'plan', state: { ...state, currentStepIndex: undefined } };
};

export const extractStage: StageHandler = async (state, ctx) => {
  try {
    const output = await ctx.extract({
      goal: state.goal,
      transcript: state.transcript,
      context: state.transcript.renderFull([], { truncate: false }),
    });
    log.info(`Extracted ${String(output.findings.length)} findings`);
    return {
      next: 'terminal',
      state: { ...state, findings: output.findings, findingsSummary: output.summary },
    };
  } catch (err) {
    const message = `Findings extraction failed: ${errorMessage(err)}`;
    log.warn(message);
    return { next: 'terminal', state: { ...state, findings: [], findingsSummary: message } };
  }
};

const HANDLERS: Record<Exclude<Stage, 'terminal'>, StageHandler> = {
  initialize: initializeStage,
  plan: planStage,
  interpret: interpretStage,
  execute: executeStage,
  record: recordStage,
  condense: condenseStage,
  selectNext: selectNextStage,
  extract: extractStage,
};

// ── Transition function & driver ─────────────────────────────

export async function transition(
  stage: Stage,
  state: RunState,
  ctx: RunContext,
): Promise<Transition> {
  if (stage === 'terminal') return { next: 'terminal', state };

  if (ctx.signal?.aborted) {
    log.warn(`Run cancelled before stage "${stage}"`);
    return { next: 'terminal', state: { ...state, cancelled: true } };
  }

  return HANDLERS[stage](state, ctx);
}

export async function runStateMachine(
  initial: RunState,
  ctx: RunContext,
): Promise<RunResult> {
  const now = ctx.now ?? (() => new Date());
  const startedAt = now();

  let stage: Stage = 'initialize';
  let state = initial;

  while (stage !== 'terminal') {
    try {
      ({ next: stage, state } = await transition(stage, state, ctx));
    } catch (err) {
      // The transcript of steps that already ran stays in the result.
      const message = `Stage "${stage}" failed: ${errorMessage(err)}`;
      log.error(message);
      state = { ...state, lastError: { kind: 'oracle', message } };
      stage = 'terminal';
    }
  }

  return toRunResult(state, ctx.settings, startedAt, now());
}

export function toRunResult(
  state: RunState,
  settings: StateMachineSettings,
  startedAt: Date,
  finishedAt: Date,
): RunResult {
  return {
    goal: state.goal,
    goalReached: state.goalReached,
    stepCount: state.stepCount,
    maxSteps: effectiveMaxSteps(state, settings),
    outcome: computeOutcome({
      goalReached: state.goalReached,
      cancelled: state.cancelled,
      error: state.lastError,
    }),
    findings: [...state.findings],
    findingsSummary: state.findingsSummary,
    transcript: [...state.transcript.records],
    error: state.lastError?.message ?? null,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  };
}
