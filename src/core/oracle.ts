import type { LLMClient, RoleClients } from '../llm/index.js';
import type { FindingsReport, Plan } from '../schema/index.js';
import { DEFAULT_CALL_OPTIONS } from './oracleCall.js';
import type { OracleCallOptions } from './oracleCall.js';
import { DEFAULT_PREAMBLE } from './prompts.js';
import { planAttack } from './planner.js';
import type { PlannerInput } from './planner.js';
import { translateStep } from './interpreter.js';
import type { InterpreterInput } from './interpreter.js';
import { condenseContext } from './summarizer.js';
import { extractVulnerabilities } from './extractor.js';

// ── AttackOracle ─────────────────────────────────────────────

/**
 * The four prompt roles the state machine relies on.
 *
 * `plan` and `extractFindings` always resolve (falling back on bad output or
 * timeout); `translate` and `condense` reject on timeout or provider errors.
 */
export interface AttackOracle {
  plan(input: PlannerInput): Promise<Plan>;
  translate(input: InterpreterInput): Promise<string>;
  condense(context: string): Promise<string>;
  extractFindings(context: string): Promise<FindingsReport>;
}

export interface AttackOracleOptions {
  preamble?: string | undefined;
  timeoutMs?: number | undefined;
  repairAttempts?: number | undefined;
}

function isRoleClients(clients: LLMClient | RoleClients): clients is RoleClients {
  return !('generate' in clients);
}

/** Pass one client for every role, or a client per role. */
export function createAttackOracle(
  clients: LLMClient | RoleClients,
  options: AttackOracleOptions = {},
): AttackOracle {
  const roles: RoleClients = isRoleClients(clients)
    ? clients
    : { planner: clients, interpreter: clients, summarizer: clients, extractor: clients };

  const callOptions: OracleCallOptions = {
    preamble: options.preamble ?? DEFAULT_PREAMBLE,
    timeoutMs: options.timeoutMs ?? DEFAULT_CALL_OPTIONS.timeoutMs,
    repairAttempts: options.repairAttempts ?? DEFAULT_CALL_OPTIONS.repairAttempts,
  };

  return {
    plan: (input) => planAttack(roles.planner, input, callOptions),
    translate: (input) => translateStep(roles.interpreter, input, callOptions),
    condense: (context) => condenseContext(roles.summarizer, context, callOptions),
    extractFindings: (context) => extractVulnerabilities(roles.extractor, context, callOptions),
  };
}
