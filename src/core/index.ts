/**
 * Core orchestration module.
 * Coordinates planner → interpreter → channel → extractor through the run
 * state machine. No CLI, no terminal output beyond the logger.
 */

export { ConfigError, OracleTimeoutError } from './errors.js';
export { extractJSON, parseStructured } from './validator.js';
export type { ParseError, ParseErrorKind, ParseResult } from './validator.js';
export { ContextWindow, STEP_MARKER, TRUNCATION_MARKER } from './contextWindow.js';
export type { ContextWindowOptions } from './contextWindow.js';
export {
  CycleError,
  MissingRefError,
  resolveOrder,
  resolveTaskSettings,
} from './dependencyResolver.js';
export type { EffectiveTaskSettings, ResolveResult } from './dependencyResolver.js';
export { sanitizeCommand, BLOCKED_COMMAND, DESTRUCTIVE_PATTERNS } from './sanitizer.js';
export type { SanitizedCommand } from './sanitizer.js';
export { createAttackOracle } from './oracle.js';
export type { AttackOracle, AttackOracleOptions } from './oracle.js';
export { planAttack } from './planner.js';
export type { PlannerInput } from './planner.js';
export {
  extractVulnerabilities,
  oracleFindingsStrategy,
  scanServices,
  serviceScanStrategy,
} from './extractor.js';
export type { ExtractionInput, ExtractionOutput, FindingsStrategy } from './extractor.js';
export {
  createRunState,
  decideBranch,
  runStateMachine,
  transition,
} from './stateMachine.js';
export type {
  RunContext,
  RunState,
  Stage,
  StateMachineSettings,
  Transition,
} from './stateMachine.js';
export {
  describeTarget,
  runBatch,
  runGoal,
  strategyFor,
  summarizeBatch,
} from './coordinator.js';
export type { RunBatchOptions, RunGoalOptions } from './coordinator.js';
