/**
 * Default configuration values.
 * Overridable via environment, CLI flags, and task set documents.
 */

export const TIMEOUTS = {
  COMMAND_TIMEOUT_SECONDS: 30,
  CONNECT_TIMEOUT: 10_000,
  ORACLE_TIMEOUT: 120_000,
  SHELL_SETTLE: 1_000,
  OUTPUT_POLL_INTERVAL: 100,
} as const;

export const LIMITS = {
  MAX_STEPS: 20,
  TASK_MAX_STEPS: 15,
  MAX_CONSECUTIVE_REPLANS: 3,
  MAX_REPAIR_ATTEMPTS: 1,
} as const;

export const CONTEXT = {
  MAX_CHARS: 16_000,
  CONDENSE_THRESHOLD: 8_000,
} as const;

export const DEFAULT_OUTPUT_DIR = './attack_results';

/** Offered by `redloop goals`, `attack --pick` and `attack --interactive`. */
export const DEFAULT_GOALS = [
  'Enumerate all services running on the target system',
  'Find and extract sensitive files from the system',
  'Identify misconfigurations in system services',
  'Discover potential privilege escalation paths',
  'Check whether a persistent foothold can be established',
  'Enumerate all user accounts on the system',
  'Scan for vulnerable services and applications',
  'Extract database credentials and content',
] as const;

export const MIN_CUSTOM_GOAL_LENGTH = 10;
