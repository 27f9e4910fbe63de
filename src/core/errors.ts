import type { ZodError } from 'zod';

// ── Configuration errors ─────────────────────────────────────
// Fatal to a batch load; surfaced before any task runs.

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Zod issues as `path: message`, joined by "; ". `label` renames the first
 * path segment, e.g. from a field to the variable it was read from.
 */
export function formatIssues(
  err: ZodError,
  label: (key: string) => string = (key) => key,
): string {
  return err.issues
    .map((issue) => {
      const [head, ...rest] = issue.path.map(String);
      if (head === undefined) return issue.message;
      return `${[label(head), ...rest].join('.')}: ${issue.message}`;
    })
    .join('; ');
}

// ── Oracle errors ────────────────────────────────────────────

export class OracleTimeoutError extends Error {
  constructor(
    readonly role: string,
    readonly timeoutMs: number,
  ) {
    super(`Oracle ${role} call timed out after ${String(timeoutMs)}ms`);
    this.name = 'OracleTimeoutError';
  }
}
