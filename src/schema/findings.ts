import { z } from 'zod';

// ── Vulnerability report (oracle extraction) ────────────────

export const vulnerabilitySchema = z.object({
  type: z.string(),
  description: z.string(),
  evidence: z.string(),
  severity: z.string(),
  remediation: z.string(),
});

export type Vulnerability = z.infer<typeof vulnerabilitySchema>;

export const findingsReportSchema = z.object({
  vulnerabilities: z.array(vulnerabilitySchema),
  summary: z.string(),
});

export type FindingsReport = z.infer<typeof findingsReportSchema>;

export function emptyFindingsReport(reason: string): FindingsReport {
  return { vulnerabilities: [], summary: reason };
}

// ── Finding (tagged union of both extraction shapes) ────────

export const vulnerabilityFindingSchema = vulnerabilitySchema.extend({
  kind: z.literal('vulnerability'),
});

export const serviceFindingSchema = z.object({
  kind: z.literal('service'),
  port: z.string().min(1),
  service: z.string(),
});

export const findingSchema = z.discriminatedUnion('kind', [
  vulnerabilityFindingSchema,
  serviceFindingSchema,
]);

export type Finding = z.infer<typeof findingSchema>;
export type VulnerabilityFinding = z.infer<typeof vulnerabilityFindingSchema>;
export type ServiceFinding = z.infer<typeof serviceFindingSchema>;

export function toVulnerabilityFinding(v: Vulnerability): VulnerabilityFinding {
  return { kind: 'vulnerability', ...v };
}
