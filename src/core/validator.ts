import type { z } from 'zod';

// ── Public types ─────────────────────────────────────────────

// `timeout` lets an expired oracle call travel the same fallback path.
export type ParseErrorKind = 'invalid_json' | 'schema_mismatch' | 'timeout';

export interface ParseError {
  kind: ParseErrorKind;
  message: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Find outermost object braces
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Parse freeform oracle output against a zod schema.
 * Never throws: malformed input comes back as a ParseError value.
 */
export function parseStructured<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
): ParseResult<z.output<S>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: { kind: 'invalid_json', message: `Invalid JSON: ${message}` } };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return {
      ok: false,
      error: { kind: 'schema_mismatch', message: formatIssues(result.error) },
    };
  }

  return { ok: true, value: result.data };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}
