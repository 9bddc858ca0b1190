/**
 * Compliance Validator
 *
 * Evaluates every rule of a policy type against every transaction and
 * aggregates the violations into a compliance status.
 */

import type { CatalogHolder, RuleCatalog } from './catalog.js';
import { evaluateRule } from './evaluator.js';
import { ValidationError } from './errors.js';
import {
  POLICY_TYPES,
  SEVERITY_ORDER,
  compareSeverity,
  emptySeverityCounts,
  isPolicyType,
  type ComplianceStatus,
  type PolicyType,
  type Severity,
  type Transaction,
  type ValidationOutcome,
  type Violation,
} from './types.js';

/**
 * Parse a loosely-typed policy type ("aml", "Financial") at the boundary.
 *
 * @throws ValidationError for anything outside the closed set
 */
export function parsePolicyType(value: string): PolicyType {
  const normalized = value.trim().toUpperCase();
  if (!isPolicyType(normalized)) {
    throw new ValidationError(`Unknown policy type: ${value}`, {
      field: 'policyType',
      allowed: [...POLICY_TYPES],
    });
  }
  return normalized;
}

export function computeComplianceStatus(
  violations: readonly Violation[],
  totalTransactions: number
): ComplianceStatus {
  const severityCounts = emptySeverityCounts();
  for (const violation of violations) {
    severityCounts[violation.severity] += 1;
  }

  const base = {
    totalTransactions,
    totalViolations: violations.length,
    severityCounts: Object.freeze(severityCounts),
  };

  const highestSeverity = [...SEVERITY_ORDER].reverse().find((severity) => severityCounts[severity] > 0);
  if (highestSeverity === undefined) {
    return Object.freeze({ ...base, overallStatus: 'COMPLIANT' as const });
  }
  return Object.freeze({ ...base, overallStatus: 'NON_COMPLIANT' as const, highestSeverity });
}

/**
 * Keep violations at or above a severity
 */
export function filterBySeverity(violations: readonly Violation[], minimum: Severity): Violation[] {
  return violations.filter((violation) => compareSeverity(violation.severity, minimum) >= 0);
}

export class ComplianceValidator {
  constructor(private readonly catalogs: CatalogHolder) {}

  /**
   * Validate transactions against the rules of a policy type.
   *
   * Violations are ordered by transaction (input order), then by rule
   * (catalog order).
   *
   * @throws ValidationError for an empty transaction set or unknown policy type
   */
  validate(transactions: readonly Transaction[], policyType: PolicyType | string): ValidationOutcome {
    const resolvedPolicy = parsePolicyType(policyType);
    if (transactions.length === 0) {
      throw new ValidationError('Transaction set is empty', { field: 'transactions' });
    }

    return evaluateAll(this.catalogs.get(), transactions, resolvedPolicy);
  }
}

/**
 * Evaluate against a specific catalog snapshot
 */
export function evaluateAll(
  catalog: RuleCatalog,
  transactions: readonly Transaction[],
  policyType: PolicyType
): ValidationOutcome {
  const rules = catalog.rulesFor(policyType);
  const violations: Violation[] = [];
  let rulesEvaluated = 0;

  for (const transaction of transactions) {
    for (const rule of rules) {
      rulesEvaluated += 1;
      const violation = evaluateRule(rule, transaction);
      if (violation) {
        violations.push(violation);
      }
    }
  }

  return {
    policyType,
    violations: Object.freeze(violations),
    status: computeComplianceStatus(violations, transactions.length),
    rulesEvaluated,
    catalogVersion: catalog.version,
  };
}
