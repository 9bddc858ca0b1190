/**
 * Audit Report Synthesizer
 *
 * Turns validator output into an audit report with deterministic,
 * deduplicated recommendations.
 */

import { generateId } from '@ledgerproof/utils';
import type {
  AuditReport,
  ComplianceStatus,
  ReportingPeriod,
  ReportSummary,
  ReportType,
  Violation,
} from './types.js';

export const RECOMMENDATIONS = {
  ENHANCED_DUE_DILIGENCE: 'Enhanced due diligence required',
  ADDITIONAL_DOCUMENTATION: 'Additional documentation required',
  ESCALATE: 'Escalate to compliance officer',
} as const;

export const DEFAULT_ESCALATION_THRESHOLD = 10;

export interface SynthesisOptions {
  /** Violation count at which the run is escalated */
  escalationThreshold?: number;
  /** Description of the input filter */
  scope?: string;
  now?: () => Date;
  idGenerator?: () => string;
}

/**
 * Recommendations in insertion order of their first trigger
 */
export function deriveRecommendations(
  violations: readonly Violation[],
  escalationThreshold: number = DEFAULT_ESCALATION_THRESHOLD
): string[] {
  const recommendations = new Set<string>();

  for (const violation of violations) {
    if (violation.severity === 'CRITICAL') {
      recommendations.add(RECOMMENDATIONS.ENHANCED_DUE_DILIGENCE);
    }
    if (violation.riskCategory === 'PEP') {
      recommendations.add(RECOMMENDATIONS.ADDITIONAL_DOCUMENTATION);
    }
    if (violation.recommendation) {
      recommendations.add(violation.recommendation);
    }
  }

  if (violations.length > 0 && violations.length > escalationThreshold) {
    recommendations.add(RECOMMENDATIONS.ESCALATE);
  }

  return [...recommendations];
}

export function summarize(violations: readonly Violation[], status: ComplianceStatus): ReportSummary {
  const flaggedTransactions = new Set(violations.map((violation) => violation.transactionId)).size;
  const analyzed = status.totalTransactions;
  const complianceRate =
    analyzed === 0 ? 100 : Math.round(((analyzed - flaggedTransactions) / analyzed) * 1000) / 10;

  return {
    transactionsAnalyzed: analyzed,
    violationsFound: status.totalViolations,
    flaggedTransactions,
    complianceRate,
  };
}

/**
 * Build an audit report. Pure given its inputs and the injected clock and id
 * generator; the violation list is copied, never mutated.
 */
export function synthesizeReport(
  violations: readonly Violation[],
  status: ComplianceStatus,
  reportType: ReportType,
  period: ReportingPeriod,
  options: SynthesisOptions = {}
): AuditReport {
  const now = options.now ?? (() => new Date());
  const idGenerator = options.idGenerator ?? (() => generateId('rpt'));

  return Object.freeze({
    reportId: idGenerator(),
    reportType,
    period: Object.freeze({ ...period }),
    scope: options.scope ?? 'unspecified',
    generatedAt: now().toISOString(),
    violations: Object.freeze([...violations]),
    status,
    recommendations: Object.freeze(deriveRecommendations(violations, options.escalationThreshold)),
    summary: Object.freeze(summarize(violations, status)),
  });
}
