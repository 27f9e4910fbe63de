import { z } from 'zod';

import { ConfigError, formatIssues } from '../core/errors.js';
import type { RetryPolicy } from './retry.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

// ── Oracle roles ─────────────────────────────────────────────

export const ORACLE_ROLES = ['planner', 'interpreter', 'summarizer', 'extractor'] as const;

export type OracleRole = (typeof ORACLE_ROLES)[number];

/** One client per prompt role; roles without their own model share a client. */
export type RoleClients = Readonly<Record<OracleRole, LLMClient>>;

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  maxTokens: z.coerce.number().int().positive().default(4096),
  // Planning output should be repeatable for the same transcript.
  temperature: z.coerce.number().min(0).max(2).default(0),
  /** Per-role overrides of `model`. */
  roleModels: z
    .object({
      planner: z.string().min(1),
      interpreter: z.string().min(1),
      summarizer: z.string().min(1),
      extractor: z.string().min(1),
    })
    .partial()
    .optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

export interface ProviderOptions {
  apiKey: string;
  model?: string | undefined;
  maxTokens: number;
  temperature: number;
  retry?: RetryPolicy | undefined;
}

// ── Env loader ───────────────────────────────────────────────

const API_KEY_VARS = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

export function apiKeyVariable(provider: Exclude<LLMProvider, 'mock'>): string {
  return API_KEY_VARS[provider];
}

/** PLANNER_MODEL, INTERPRETER_MODEL, SUMMARIZER_MODEL, EXTRACTOR_MODEL. */
export function roleModelVariable(role: OracleRole): string {
  return `${role.toUpperCase()}_MODEL`;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

export function loadLLMConfig(
  env: Record<string, string | undefined> = process.env,
): LLMConfig {
  const provider = llmProviderSchema.safeParse(nonEmpty(env['LLM_PROVIDER']) ?? 'anthropic');
  if (!provider.success) {
    throw new ConfigError(`LLM_PROVIDER must be one of: ${llmProviderSchema.options.join(', ')}`);
  }

  const result = llmConfigSchema.safeParse({
    provider: provider.data,
    apiKey: provider.data === 'mock' ? undefined : nonEmpty(env[apiKeyVariable(provider.data)]),
    model: nonEmpty(env['REDLOOP_MODEL']) ?? nonEmpty(env['LLM_MODEL']),
    maxTokens: nonEmpty(env['LLM_MAX_TOKENS']),
    temperature: nonEmpty(env['LLM_TEMPERATURE']),
    roleModels: Object.fromEntries(
      ORACLE_ROLES.map((role) => [role, nonEmpty(env[roleModelVariable(role)])]),
    ),
  });
  if (!result.success) {
    const names: Record<string, string> = { maxTokens: 'LLM_MAX_TOKENS', temperature: 'LLM_TEMPERATURE' };
    throw new ConfigError(`Invalid LLM settings: ${formatIssues(result.error, (key) => names[key] ?? key)}`);
  }
  return result.data;
}
