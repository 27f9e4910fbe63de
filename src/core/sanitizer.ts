// ── Denylist ─────────────────────────────────────────────────
// Substring match only: a best-effort guard, not a security boundary.

export const DESTRUCTIVE_PATTERNS: readonly string[] = [
  'rm -rf /',
  'rm -rf /*',
  '> /dev/sda',
  'mkfs',
  'dd if=/dev/zero',
];

export const BLOCKED_COMMAND = "echo 'Command blocked for safety reasons'";

export interface SanitizedCommand {
  command: string;
  blocked: boolean;
}

// ── Main entry ───────────────────────────────────────────────

export function sanitizeCommand(raw: string): SanitizedCommand {
  let command = stripFences(raw.trim());

  // A command must be a single shell invocation
  const firstLine = command.split('\n').find((line) => line.trim().length > 0);
  command = (firstLine ?? '').trim();

  command = stripQuotes(command);
  if (command.startsWith('$ ')) command = command.slice(2).trim();

  const denied = DESTRUCTIVE_PATTERNS.some((pattern) => command.includes(pattern));
  if (denied) return { command: BLOCKED_COMMAND, blocked: true };

  return { command, blocked: false };
}

// ── Helpers ──────────────────────────────────────────────────

function stripFences(text: string): string {
  const inline = /^```([^`\n]+)```$/.exec(text);
  if (inline?.[1] !== undefined) return inline[1].trim();

  const fenced = /^```[\w-]*\s*\n?([\s\S]*?)\n?```$/.exec(text);
  if (fenced?.[1] !== undefined) return fenced[1].trim();
  return text;
}

// Only a matching pair wrapping the whole command is removed.
function stripQuotes(text: string): string {
  const first = text.charAt(0);
  if (text.length >= 2 && `'"\``.includes(first) && text.endsWith(first)) {
    return text.slice(1, -1).trim();
  }
  return text;
}
