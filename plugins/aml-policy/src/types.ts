/**
 * Compliance Domain Types
 *
 * Transactions, rules, violations, statuses and reports shared by the
 * evaluator, validator, report synthesizer and the audit trail.
 */

/**
 * Counterparty risk category
 */
export type RiskCategory = 'LOW' | 'MEDIUM' | 'HIGH' | 'PEP';

export const RISK_CATEGORIES = ['LOW', 'MEDIUM', 'HIGH', 'PEP'] as const satisfies readonly RiskCategory[];

/**
 * Violation severity
 */
export type Severity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Severities in ascending order (LOW < MEDIUM < HIGH < CRITICAL)
 */
export const SEVERITY_ORDER = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const satisfies readonly Severity[];

/**
 * Policy scope a rule belongs to
 */
export type PolicyType = 'AML' | 'FINANCIAL' | 'REGULATORY';

export const POLICY_TYPES = ['AML', 'FINANCIAL', 'REGULATORY'] as const satisfies readonly PolicyType[];

/**
 * Audit report kind
 */
export type ReportType = 'AML' | 'COMPLIANCE' | 'FINANCIAL' | 'RISK' | 'REGULATORY';

export const REPORT_TYPES = ['AML', 'COMPLIANCE', 'FINANCIAL', 'RISK', 'REGULATORY'] as const satisfies readonly ReportType[];

/**
 * Transaction fact, supplied by the transaction store. Amounts are expected
 * in the reference currency by the time they reach the evaluator.
 */
export interface Transaction {
  /** Transaction unique identifier */
  readonly transactionId: string;
  readonly amount: number;
  /** ISO-4217 currency code */
  readonly currency: string;
  /** Counterparty country name */
  readonly country: string;
  /** WIRE, CHECK, CASH, ... */
  readonly paymentMethod: string;
  readonly riskCategory: RiskCategory;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  /** Supplier / account reference */
  readonly supplierName: string;
  readonly description?: string;
}

export type AmountComparator = '>' | '>=';

export interface AmountThresholdCondition {
  readonly type: 'amount_threshold';
  readonly comparator: AmountComparator;
  readonly threshold: number;
}

export interface CountryCondition {
  readonly type: 'country_in';
  readonly countries: readonly string[];
}

export interface PaymentMethodCondition {
  readonly type: 'payment_method_in';
  readonly methods: readonly string[];
}

export interface RiskCategoryCondition {
  readonly type: 'risk_category_in';
  readonly categories: readonly RiskCategory[];
}

/**
 * A single predicate of a rule. Conditions of a rule are AND-combined.
 */
export type RuleCondition =
  | AmountThresholdCondition
  | CountryCondition
  | PaymentMethodCondition
  | RiskCategoryCondition;

export type RuleConditionType = RuleCondition['type'];

/**
 * Compliance rule definition
 */
export interface ComplianceRule {
  /** Unique within a catalog */
  readonly ruleId: string;
  readonly name: string;
  readonly description: string;
  readonly policyType: PolicyType;
  readonly severity: Severity;
  /** Never empty */
  readonly conditions: readonly RuleCondition[];
  /** Action required when the rule fires */
  readonly remediation: string;
  /** Report-level advice contributed when the rule fires */
  readonly recommendation?: string;
  readonly tags: readonly string[];
}

/**
 * A rule that fired for a transaction
 */
export interface Violation {
  readonly transactionId: string;
  readonly ruleId: string;
  readonly ruleName: string;
  readonly severity: Severity;
  readonly explanation: string;
  readonly remediation: string;
  readonly recommendation?: string;
  readonly amount: number;
  readonly currency: string;
  readonly country: string;
  readonly paymentMethod: string;
  readonly riskCategory: RiskCategory;
  readonly supplierName: string;
}

export type SeverityCounts = Record<Severity, number>;

interface ComplianceStatusBase {
  readonly totalTransactions: number;
  readonly totalViolations: number;
  readonly severityCounts: Readonly<SeverityCounts>;
}

export interface CompliantStatus extends ComplianceStatusBase {
  readonly overallStatus: 'COMPLIANT';
}

export interface NonCompliantStatus extends ComplianceStatusBase {
  readonly overallStatus: 'NON_COMPLIANT';
  readonly highestSeverity: Severity;
}

/**
 * Aggregate verdict over a transaction set
 */
export type ComplianceStatus = CompliantStatus | NonCompliantStatus;

export type OverallStatus = ComplianceStatus['overallStatus'];

/**
 * Output of a validation run
 */
export interface ValidationOutcome {
  readonly policyType: PolicyType;
  readonly violations: readonly Violation[];
  readonly status: ComplianceStatus;
  /** Number of (rule, transaction) pairs evaluated */
  readonly rulesEvaluated: number;
  /** Catalog version the run evaluated against */
  readonly catalogVersion: string;
}

export interface ReportingPeriod {
  /** ISO-8601 start */
  readonly from: string;
  /** ISO-8601 end */
  readonly to: string;
  readonly label?: string;
}

export interface ReportSummary {
  readonly transactionsAnalyzed: number;
  readonly violationsFound: number;
  /** Distinct transactions with at least one violation */
  readonly flaggedTransactions: number;
  /** Percentage of transactions without violations, one decimal */
  readonly complianceRate: number;
}

/**
 * Point-in-time audit report
 */
export interface AuditReport {
  readonly reportId: string;
  readonly reportType: ReportType;
  readonly period: ReportingPeriod;
  /** Description of the input filter the run covered */
  readonly scope: string;
  readonly generatedAt: string;
  readonly violations: readonly Violation[];
  readonly status: ComplianceStatus;
  readonly recommendations: readonly string[];
  readonly summary: ReportSummary;
}

/**
 * Archived run in the audit trail
 */
export interface AuditTrailEntry {
  /** Monotonically increasing, starting at 1 */
  readonly runId: number;
  readonly recordedAt: string;
  readonly scope: string;
  readonly reportType: ReportType;
  readonly reportId: string;
  readonly overallStatus: OverallStatus;
  readonly totalViolations: number;
  readonly report: AuditReport;
  readonly previousHash: string | null;
  readonly entryHash: string;
}

/**
 * Long-term retention of reports. Implemented by the audit trail store.
 */
export interface AuditArchive {
  record(report: AuditReport): Promise<AuditTrailEntry>;
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

export function isSeverity(value: string): value is Severity {
  return SEVERITY_ORDER.some((severity) => severity === value);
}

export function isPolicyType(value: string): value is PolicyType {
  return POLICY_TYPES.some((policyType) => policyType === value);
}

export function isReportType(value: string): value is ReportType {
  return REPORT_TYPES.some((reportType) => reportType === value);
}

export function emptySeverityCounts(): SeverityCounts {
  return { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
}
