import { describe, it, expect } from 'vitest';

import { createMockClient } from '../llm/index.js';
import type { StepRecord } from '../schema/index.js';
import { ContextWindow } from './contextWindow.js';
import {
  extractVulnerabilities,
  oracleFindingsStrategy,
  scanServices,
  serviceScanStrategy,
} from './extractor.js';

function record(output: string): StepRecord {
  return {
    planText: 'Scan ports',
    command: 'nmap localhost',
    output,
    timestamp: '2024-01-01T00:00:00.000Z',
  };
}

const NMAP_OUTPUT = [
  'Starting Nmap 7.94',
  'PORT    STATE  SERVICE',
  '80/tcp open http Apache',
  '22/tcp  open   ssh',
  '443/tcp closed https',
  '8080/tcp is mentioned in a sentence',
].join('\n');

describe('scanServices', () => {
  it('should turn port lines into service findings', () => {
    expect(scanServices([record(NMAP_OUTPUT)])).toEqual([
      { kind: 'service', port: '80/tcp', service: 'open http Apache' },
      { kind: 'service', port: '22/tcp', service: 'open ssh' },
      { kind: 'service', port: '443/tcp', service: 'closed https' },
    ]);
  });

  it('should keep one finding per port with the latest sighting', () => {
    const findings = scanServices([
      record('80/tcp open http Apache'),
      record('80/tcp open http nginx 1.25'),
    ]);
    expect(findings).toEqual([{ kind: 'service', port: '80/tcp', service: 'open http nginx 1.25' }]);
  });

  it('should find nothing in ordinary output', () => {
    expect(scanServices([record('uid=0(root) gid=0(root)')])).toEqual([]);
  });
});

describe('serviceScanStrategy', () => {
  it('should summarize the number of ports found', async () => {
    const transcript = ContextWindow.create('scan').append(record(NMAP_OUTPUT));
    const output = await serviceScanStrategy({
      goal: 'scan',
      transcript,
      context: transcript.render(),
    });
    expect(output.findings).toHaveLength(3);
    expect(output.summary).toBe('Discovered 3 port entries');
  });
});

describe('oracleFindingsStrategy', () => {
  it('should tag oracle vulnerabilities', async () => {
    const strategy = oracleFindingsStrategy({
      extractFindings: async () => ({
        vulnerabilities: [
          {
            type: 'Weak credentials',
            description: 'Root login accepts a default password',
            evidence: 'ssh root@lab succeeded',
            severity: 'high',
            remediation: 'Disable password login',
          },
        ],
        summary: 'One weakness',
      }),
    });

    const output = await strategy({
      goal: 'g',
      transcript: ContextWindow.create('g'),
      context: 'GOAL: g\n\n',
    });

    expect(output).toEqual({
      findings: [
        {
          kind: 'vulnerability',
          type: 'Weak credentials',
          description: 'Root login accepts a default password',
          evidence: 'ssh root@lab succeeded',
          severity: 'high',
          remediation: 'Disable password login',
        },
      ],
      summary: 'One weakness',
    });
  });
});

describe('extractVulnerabilities', () => {
  const options = { preamble: 'p', timeoutMs: 1_000, repairAttempts: 1 };

  it('should parse a valid report', async () => {
    const client = createMockClient(['{"vulnerabilities":[],"summary":"Nothing confirmed"}']);
    const report = await extractVulnerabilities(client, 'GOAL: g\n\n', options);
    expect(report).toEqual({ vulnerabilities: [], summary: 'Nothing confirmed' });
  });

  it('should fall back to an empty report', async () => {
    const client = createMockClient(['garbage', 'more garbage']);
    const report = await extractVulnerabilities(client, 'GOAL: g\n\n', options);
    expect(report).toEqual({
      vulnerabilities: [],
      summary: 'Unable to extract vulnerabilities from the provided context.',
    });
  });
});
