// Subcommand registration; the `redloop` binary itself is main.ts.
export { registerAttackCommand, registerBatchCommand, registerGoalsCommand } from './run.js';
export { GoalSelectionCancelled, formatGoalList, pickGoal, resolveGoal, validateCustomGoal } from './goals.js';
export type { GoalPrompt, GoalSource } from './goals.js';
