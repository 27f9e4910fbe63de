import type { z } from 'zod';

import type { LLMClient } from '../llm/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { OracleTimeoutError } from './errors.js';
import { renderPrompt } from './prompts.js';
import { parseStructured } from './validator.js';
import type { ParseResult } from './validator.js';

// ── Shared options ───────────────────────────────────────────

export interface OracleCallOptions {
  preamble: string;
  timeoutMs: number;
  repairAttempts: number;
}

export const DEFAULT_CALL_OPTIONS = {
  timeoutMs: TIMEOUTS.ORACLE_TIMEOUT,
  repairAttempts: LIMITS.MAX_REPAIR_ATTEMPTS,
} as const;

// ── Timeout ──────────────────────────────────────────────────

export async function withTimeout<T>(
  role: string,
  timeoutMs: number,
  run: () => Promise<T>,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new OracleTimeoutError(role, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([run(), expiry]);
  } finally {
    clearTimeout(timer);
  }
}

// ── Structured request with one repair re-prompt ─────────────

export interface StructuredRequest<S extends z.ZodTypeAny> {
  role: string;
  systemPrompt: string;
  userPrompt: string;
  schema: S;
}

/**
 * Ask the oracle for JSON matching `schema`. A malformed answer gets up to
 * `repairAttempts` repair prompts; a timeout is reported as a ParseError.
 */
export async function requestStructured<S extends z.ZodTypeAny>(
  client: LLMClient,
  request: StructuredRequest<S>,
  options: OracleCallOptions,
): Promise<ParseResult<z.output<S>>> {
  const call = (userPrompt: string): Promise<string> =>
    withTimeout(request.role, options.timeoutMs, () =>
      client.generate(request.systemPrompt, userPrompt),
    );

  let raw: string;
  try {
    raw = await call(request.userPrompt);
  } catch (err) {
    return timeoutAsParseError(err);
  }

  let result = parseStructured(raw, request.schema);

  for (let attempt = 0; !result.ok && attempt < options.repairAttempts; attempt++) {
    log.warn(`${request.role} parse failed, attempting repair: ${result.error.message}`);
    const repairPrompt = await renderPrompt('repair', {
      error: result.error.message,
      previousOutput: raw,
    });

    try {
      raw = await call(repairPrompt);
    } catch (err) {
      return timeoutAsParseError(err);
    }
    result = parseStructured(raw, request.schema);
  }

  return result;
}

function timeoutAsParseError(err: unknown): ParseResult<never> {
  if (err instanceof OracleTimeoutError) {
    return { ok: false, error: { kind: 'timeout', message: err.message } };
  }
  throw err;
}
