import { z } from 'zod';

import { ConfigError, formatIssues } from '../core/errors.js';
import { CONTEXT, LIMITS, TIMEOUTS } from './defaults.js';
import { targetSchema } from '../schema/taskSet.js';
import type { Target } from '../schema/taskSet.js';

// ── Run settings ─────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', 'True', 'False', '1', '0'])
  .transform((v) => v === 'true' || v === 'True' || v === '1');

export const runSettingsSchema = z.object({
  maxSteps: z.coerce.number().int().positive().default(LIMITS.MAX_STEPS),
  useSummarizer: booleanFlag.default('true'),
  maxContextChars: z.coerce.number().int().positive().default(CONTEXT.MAX_CHARS),
  condenseThreshold: z.coerce
    .number()
    .int()
    .positive()
    .default(CONTEXT.CONDENSE_THRESHOLD),
  commandTimeoutSeconds: z.coerce
    .number()
    .positive()
    .default(TIMEOUTS.COMMAND_TIMEOUT_SECONDS),
  oracleTimeoutMs: z.coerce.number().int().positive().default(TIMEOUTS.ORACLE_TIMEOUT),
});

export type RunSettings = z.infer<typeof runSettingsSchema>;

// ── Env loaders ──────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function secondsToMs(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw) * 1000;
}

function nonEmpty(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

const RUN_SETTING_VARS: Record<keyof RunSettings, string> = {
  maxSteps: 'MAX_ATTACK_STEPS',
  useSummarizer: 'USE_SUMMARIZER',
  maxContextChars: 'MAX_CONTEXT_LENGTH',
  condenseThreshold: 'CONDENSE_THRESHOLD',
  commandTimeoutSeconds: 'COMMAND_TIMEOUT',
  oracleTimeoutMs: 'ORACLE_TIMEOUT',
};

const TARGET_VARS: Record<string, string> = {
  host: 'SSH_HOST',
  port: 'SSH_PORT',
  username: 'SSH_USERNAME',
  password: 'SSH_PASSWORD',
  key_path: 'SSH_KEY_PATH',
};

function envName(names: Record<string, string>): (key: string) => string {
  return (key) => names[key] ?? key;
}

export function loadRunSettings(env: Env = process.env): RunSettings {
  const result = runSettingsSchema.safeParse({
    maxSteps: nonEmpty(env['MAX_ATTACK_STEPS']),
    useSummarizer: nonEmpty(env['USE_SUMMARIZER']),
    maxContextChars: nonEmpty(env['MAX_CONTEXT_LENGTH']),
    condenseThreshold: nonEmpty(env['CONDENSE_THRESHOLD']),
    commandTimeoutSeconds: nonEmpty(env['COMMAND_TIMEOUT']),
    oracleTimeoutMs: secondsToMs(env['ORACLE_TIMEOUT']),
  });
  if (!result.success) {
    throw new ConfigError(`Invalid run settings: ${formatIssues(result.error, envName(RUN_SETTING_VARS))}`);
  }
  return result.data;
}

export function loadTargetConfig(env: Env = process.env): Target {
  const result = targetSchema.safeParse({
    host: nonEmpty(env['SSH_HOST']) ?? 'localhost',
    port: nonEmpty(env['SSH_PORT']) !== undefined ? Number(env['SSH_PORT']) : 22,
    username: nonEmpty(env['SSH_USERNAME']) ?? 'root',
    password: nonEmpty(env['SSH_PASSWORD']),
    key_path: nonEmpty(env['SSH_KEY_PATH']),
  });
  if (!result.success) {
    throw new ConfigError(`Invalid target settings: ${formatIssues(result.error, envName(TARGET_VARS))}`);
  }
  return result.data;
}
