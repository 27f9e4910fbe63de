import type { LLMClient } from '../llm/index.js';
import type {
  Finding,
  FindingsReport,
  ServiceFinding,
  StepRecord,
} from '../schema/index.js';
import {
  emptyFindingsReport,
  findingsReportSchema,
  toVulnerabilityFinding,
} from '../schema/index.js';
import * as log from '../utils/logger.js';
import type { ContextWindow } from './contextWindow.js';
import { renderPrompt } from './prompts.js';
import { requestStructured } from './oracleCall.js';
import type { OracleCallOptions } from './oracleCall.js';

// ── Oracle extraction ────────────────────────────────────────

const EXTRACTION_FALLBACK_SUMMARY =
  'Unable to extract vulnerabilities from the provided context.';

export async function extractVulnerabilities(
  client: LLMClient,
  context: string,
  options: OracleCallOptions,
): Promise<FindingsReport> {
  log.llm('Extractor reviewing transcript for findings...');

  const systemPrompt = await renderPrompt('extractor', {
    preamble: options.preamble,
    context,
  });

  const result = await requestStructured(
    client,
    {
      role: 'extractor',
      systemPrompt,
      userPrompt: 'List the confirmed weaknesses as JSON.',
      schema: findingsReportSchema,
    },
    options,
  );

  if (!result.ok) {
    log.warn(`Extractor output unusable (${result.error.kind}), reporting no findings`);
    return emptyFindingsReport(EXTRACTION_FALLBACK_SUMMARY);
  }

  return result.value;
}

// ── Pluggable strategies ─────────────────────────────────────

export interface ExtractionInput {
  goal: string;
  transcript: ContextWindow;
  /** Every step rendered verbatim, without the character budget. */
  context: string;
}

export interface ExtractionOutput {
  findings: Finding[];
  summary?: string | undefined;
}

export type FindingsStrategy = (input: ExtractionInput) => Promise<ExtractionOutput>;

export function oracleFindingsStrategy(oracle: {
  extractFindings(context: string): Promise<FindingsReport>;
}): FindingsStrategy {
  return async (input) => {
    const report = await oracle.extractFindings(input.context);
    return {
      findings: report.vulnerabilities.map(toVulnerabilityFinding),
      summary: report.summary,
    };
  };
}

export const serviceScanStrategy: FindingsStrategy = async (input) => {
  const findings = scanServices(input.transcript.records);
  return {
    findings,
    summary: `Discovered ${String(findings.length)} port entries`,
  };
};

// ── Port/service scan ────────────────────────────────────────
// Matches scanner lines such as "22/tcp   open  ssh  OpenSSH 8.2p1".

const PORT_LINE = /^\s*(\d{1,5}\/(?:tcp|udp|sctp))\s+(\S.*)$/;
const PORT_STATES = new Set([
  'open',
  'closed',
  'filtered',
  'unfiltered',
  'open|filtered',
  'closed|filtered',
]);

/** One finding per port; a later sighting of the same port replaces the earlier one. */
export function scanServices(records: readonly StepRecord[]): ServiceFinding[] {
  const byPort = new Map<string, ServiceFinding>();

  for (const record of records) {
    for (const line of record.output.split(/\r?\n/)) {
      const match = PORT_LINE.exec(line);
      if (!match?.[1] || !match[2]) continue;

      const words = match[2].trim().split(/\s+/);
      if (!PORT_STATES.has(words[0] ?? '')) continue;

      byPort.set(match[1], { kind: 'service', port: match[1], service: words.join(' ') });
    }
  }

  return [...byPort.values()];
}
