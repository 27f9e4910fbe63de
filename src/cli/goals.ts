import inquirer from 'inquirer';

import { DEFAULT_GOALS, MIN_CUSTOM_GOAL_LENGTH } from '../config/defaults.js';
import { ConfigError } from '../core/errors.js';

// ── Errors ───────────────────────────────────────────────────

/** Ctrl-C at the goal prompt. */
export class GoalSelectionCancelled extends Error {
  constructor() {
    super('Goal selection cancelled');
    this.name = 'GoalSelectionCancelled';
  }
}

// ── Sources ──────────────────────────────────────────────────

export interface GoalSource {
  goal?: string | undefined;
  /** 1-based index into the default goals. */
  pick?: number | undefined;
  interactive?: boolean | undefined;
}

export type GoalPrompt = (goals: readonly string[]) => Promise<string>;

export function validateCustomGoal(text: string): true | string {
  return text.trim().length >= MIN_CUSTOM_GOAL_LENGTH
    ? true
    : `Custom goal must be at least ${String(MIN_CUSTOM_GOAL_LENGTH)} characters long.`;
}

export function pickGoal(index: number, goals: readonly string[] = DEFAULT_GOALS): string {
  const goal = goals[index - 1];
  if (goal === undefined) {
    throw new ConfigError(`--pick must be between 1 and ${String(goals.length)}, got ${String(index)}`);
  }
  return goal;
}

export async function resolveGoal(
  source: GoalSource,
  prompt: GoalPrompt = promptForGoal,
  goals: readonly string[] = DEFAULT_GOALS,
): Promise<string> {
  const given = [source.goal !== undefined, source.pick !== undefined, source.interactive === true];
  if (given.filter(Boolean).length > 1) {
    throw new ConfigError('Pass a goal, --pick or --interactive, not more than one');
  }

  if (source.goal !== undefined) {
    const goal = source.goal.trim();
    if (goal.length === 0) throw new ConfigError('Goal must not be empty');
    return goal;
  }
  if (source.pick !== undefined) return pickGoal(source.pick, goals);
  if (source.interactive) return prompt(goals);

  throw new ConfigError('No goal given. Pass a goal, --pick <n> or --interactive');
}

export function formatGoalList(goals: readonly string[] = DEFAULT_GOALS): string {
  const width = String(goals.length).length;
  return goals.map((goal, i) => `${String(i + 1).padStart(width)}. ${goal}`).join('\n') + '\n';
}

// ── Interactive prompt ───────────────────────────────────────

const CUSTOM = '';

export async function promptForGoal(goals: readonly string[]): Promise<string> {
  if (!process.stdin.isTTY) {
    throw new ConfigError('--interactive needs a terminal; pass a goal or --pick instead');
  }

  try {
    const { goal } = await inquirer.prompt<{ goal: string }>([
      {
        type: 'select',
        name: 'goal',
        message: 'Select an attack goal',
        choices: [
          ...goals.map((g) => ({ name: g, value: g })),
          { name: 'Enter a custom goal', value: CUSTOM },
        ],
      },
    ]);
    if (goal !== CUSTOM) return goal;

    const { custom } = await inquirer.prompt<{ custom: string }>([
      {
        type: 'input',
        name: 'custom',
        message: 'Custom goal',
        validate: validateCustomGoal,
      },
    ]);
    return custom.trim();
  } catch (err) {
    if (err instanceof Error && err.name === 'ExitPromptError') throw new GoalSelectionCancelled();
    throw err;
  }
}
