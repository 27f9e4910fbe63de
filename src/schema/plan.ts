import { z } from 'zod';

// ── Plan (oracle wire form → domain form) ───────────────────

export const planSchema = z
  .object({
    steps: z.array(z.string()),
    goal_verification: z.string(),
    goal_reached: z.boolean(),
  })
  .transform((raw) => ({
    steps: raw.steps.map((s) => s.trim()).filter((s) => s.length > 0),
    verification: raw.goal_verification,
    goalReached: raw.goal_reached,
  }));

export type Plan = z.infer<typeof planSchema>;

// ── Deterministic fallback ──────────────────────────────────

export function fallbackPlan(): Plan {
  return {
    steps: ['Gather more information about the system with basic commands'],
    verification: 'Check if we have enough information to proceed',
    goalReached: false,
  };
}
