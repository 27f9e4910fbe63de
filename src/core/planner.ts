import type { LLMClient } from '../llm/index.js';
import type { Plan } from '../schema/index.js';
import { fallbackPlan, planSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { renderPrompt } from './prompts.js';
import { requestStructured } from './oracleCall.js';
import type { OracleCallOptions } from './oracleCall.js';

// ── Public types ─────────────────────────────────────────────

export interface PlannerInput {
  goal: string;
  context: string;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Ask the oracle for the next plan. Never fails on bad output: a plan that
 * cannot be validated (after repair) or an expired call yields the fallback.
 */
export async function planAttack(
  client: LLMClient,
  input: PlannerInput,
  options: OracleCallOptions,
): Promise<Plan> {
  log.llm('Planner generating next plan...');

  const systemPrompt = await renderPrompt('planner', {
    preamble: options.preamble,
    goal: input.goal,
    context: input.context,
  });

  const result = await requestStructured(
    client,
    {
      role: 'planner',
      systemPrompt,
      userPrompt: `Plan the next steps towards the goal: ${input.goal}`,
      schema: planSchema,
    },
    options,
  );

  if (!result.ok) {
    log.warn(`Planner output unusable (${result.error.kind}), using fallback plan`);
    return fallbackPlan();
  }

  logPlannedSteps(result.value);
  return result.value;
}

function logPlannedSteps(plan: Plan): void {
  log.planned(plan.steps.length, plan.goalReached);
  plan.steps.forEach((step, i) => {
    log.detail(`${String(i + 1)}. ${step}`);
  });
}
