/**
 * Report fixtures for audit trail tests
 */

import {
  computeComplianceStatus,
  synthesizeReport,
  type AuditReport,
  type ReportType,
  type Violation,
} from '@ledgerproof/aml-policy';

export interface ReportFixtureOptions {
  reportId?: string;
  reportType?: ReportType;
  scope?: string;
  violations?: Violation[];
  transactionsAnalyzed?: number;
}

export function makeViolation(overrides: Partial<Violation> = {}): Violation {
  return {
    transactionId: 'TX-1',
    ruleId: 'AML-005',
    ruleName: 'High Risk Country',
    severity: 'CRITICAL',
    explanation: 'High Risk Country: country Iran is listed',
    remediation: 'Apply enhanced due diligence and obtain management approval',
    recommendation: 'Establish additional monitoring for high-risk country transactions',
    amount: 2500,
    currency: 'EUR',
    country: 'Iran',
    paymentMethod: 'WIRE',
    riskCategory: 'MEDIUM',
    supplierName: 'Acme Supplies GmbH',
    ...overrides,
  };
}

export function makeReport(options: ReportFixtureOptions = {}): AuditReport {
  const violations = options.violations ?? [];
  const status = computeComplianceStatus(violations, options.transactionsAnalyzed ?? 1);
  return synthesizeReport(
    violations,
    status,
    options.reportType ?? 'AML',
    { from: '2024-03-01T00:00:00.000Z', to: '2024-04-01T00:00:00.000Z' },
    {
      scope: options.scope ?? 'all transactions',
      now: () => new Date('2024-04-01T08:00:00.000Z'),
      idGenerator: () => options.reportId ?? 'rpt_fixture',
    }
  );
}
