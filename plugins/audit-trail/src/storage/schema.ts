/**
 * Decoding of persisted audit trail rows.
 */

import { z } from 'zod';
import { REPORT_TYPES, RISK_CATEGORIES, SEVERITY_ORDER } from '@ledgerproof/aml-policy';
import type { AuditTrailEntry } from '../types.js';

const SeveritySchema = z.enum(SEVERITY_ORDER);

const ViolationSchema = z.object({
  transactionId: z.string(),
  ruleId: z.string(),
  ruleName: z.string(),
  severity: SeveritySchema,
  explanation: z.string(),
  remediation: z.string(),
  recommendation: z.string().optional(),
  amount: z.number(),
  currency: z.string(),
  country: z.string(),
  paymentMethod: z.string(),
  riskCategory: z.enum(RISK_CATEGORIES),
  supplierName: z.string(),
});

const SeverityCountsSchema = z.object({
  LOW: z.number(),
  MEDIUM: z.number(),
  HIGH: z.number(),
  CRITICAL: z.number(),
});

const StatusBase = {
  totalTransactions: z.number(),
  totalViolations: z.number(),
  severityCounts: SeverityCountsSchema,
};

const ComplianceStatusSchema = z.discriminatedUnion('overallStatus', [
  z.object({ ...StatusBase, overallStatus: z.literal('COMPLIANT') }),
  z.object({ ...StatusBase, overallStatus: z.literal('NON_COMPLIANT'), highestSeverity: SeveritySchema }),
]);

export const AuditReportSchema = z.object({
  reportId: z.string(),
  reportType: z.enum(REPORT_TYPES),
  period: z.object({ from: z.string(), to: z.string(), label: z.string().optional() }),
  scope: z.string(),
  generatedAt: z.string(),
  violations: z.array(ViolationSchema),
  status: ComplianceStatusSchema,
  recommendations: z.array(z.string()),
  summary: z.object({
    transactionsAnalyzed: z.number(),
    violationsFound: z.number(),
    flaggedTransactions: z.number(),
    complianceRate: z.number(),
  }),
});

const timestamp = z.union([z.date(), z.string()]).transform((value) => new Date(value).toISOString());

/**
 * Row shape of the `audit_trail_entries` table. BIGINT and COUNT columns
 * arrive as strings.
 */
export const EntryRowSchema = z.object({
  run_id: z.coerce.number().int().positive(),
  recorded_at: timestamp,
  scope: z.string(),
  report_type: z.enum(REPORT_TYPES),
  report_id: z.string(),
  overall_status: z.enum(['COMPLIANT', 'NON_COMPLIANT']),
  total_violations: z.coerce.number().int().nonnegative(),
  report: AuditReportSchema,
  previous_hash: z.string().nullable(),
  entry_hash: z.string(),
});

export function rowToEntry(row: unknown): AuditTrailEntry {
  const parsed = EntryRowSchema.parse(row);
  return {
    runId: parsed.run_id,
    recordedAt: parsed.recorded_at,
    scope: parsed.scope,
    reportType: parsed.report_type,
    reportId: parsed.report_id,
    overallStatus: parsed.overall_status,
    totalViolations: parsed.total_violations,
    report: parsed.report,
    previousHash: parsed.previous_hash,
    entryHash: parsed.entry_hash,
  };
}
