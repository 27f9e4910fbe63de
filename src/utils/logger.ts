/**
 * Live execution logger for redloop.
 *
 * Output goes to stderr; stdout is reserved for `--json` reports.
 * REDLOOP_LOG_LEVEL picks the threshold (debug, info, warn, error, silent).
 * REDLOOP_QUIET=1 is shorthand for silent.
 */

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function currentLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  if (env['REDLOOP_QUIET'] === '1') return 'silent';
  const raw = env['REDLOOP_LOG_LEVEL']?.trim().toLowerCase() ?? '';
  return isLogLevel(raw) ? raw : 'info';
}

// ── Core write ──────────────────────────────────────────────

function emit(level: Exclude<LogLevel, 'silent'>, icon: string, message: string): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(currentLevel())) return;
  process.stderr.write(icon ? `${icon} ${message}\n` : `${message}\n`);
}

// ── General ─────────────────────────────────────────────────

export function info(message: string): void {
  emit('info', 'ℹ️ ', message);
}

export function detail(message: string): void {
  emit('debug', '  ', message);
}

export function warn(message: string): void {
  emit('warn', '⚠️ ', message);
}

export function error(message: string): void {
  emit('error', '💥', message);
}

export function section(title: string): void {
  const rule = '─'.repeat(50);
  emit('info', '', `\n${rule}\n▶  ${title}\n${rule}`);
}

// ── Attack loop ─────────────────────────────────────────────

export function step(index: number, total: number, description: string): void {
  emit('info', '📋', `[${String(index + 1)}/${String(total)}] ${description}`);
}

export function planned(stepCount: number, goalReached: boolean): void {
  const suffix = goalReached ? ' (goal reported reached)' : '';
  emit('info', '🧠', `Planner: generated ${String(stepCount)} steps${suffix}`);
}

export function command(cmd: string): void {
  emit('info', '⌨️ ', `$ ${cmd}`);
}

export function blocked(original: string): void {
  emit('warn', '🛑', `Blocked destructive command: ${original}`);
}

export function channel(message: string): void {
  emit('info', '🔌', message);
}

export function llm(message: string): void {
  emit('debug', '🧠', message);
}
