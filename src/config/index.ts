/**
 * Configuration module.
 * Loads and validates runtime settings from env and task sets from files.
 * Zod-validated.
 */

export { TIMEOUTS, LIMITS, CONTEXT, DEFAULT_OUTPUT_DIR } from './defaults.js';
export { loadTaskSet, parseTaskSet } from './loader.js';
export { loadRunSettings, loadTargetConfig, runSettingsSchema } from './settings.js';
export type { RunSettings } from './settings.js';
